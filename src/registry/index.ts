export {
  ExecutorRegistry,
  DEFAULT_REGISTRY_CONFIG,
  type ExecutorRegistryOptions,
} from './executor-registry.js';

export type {
  Model,
  DiscoveredModel,
  ExecutorAdapter,
  AdapterFactory,
  AdapterFactories,
  ExecutorState,
  RegistrySnapshot,
  RegistryConfig,
} from './types.js';

export {
  createDefaultAdapterFactories,
  CliExecutorAdapter,
  HttpExecutorAdapter,
  RpcExecutorAdapter,
  StaticExecutorAdapter,
  parseModelListing,
  type CommandRunner,
} from './adapters/index.js';
