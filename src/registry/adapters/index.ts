import type { AdapterFactories } from '../types.js';
import { CliExecutorAdapter } from './cli-adapter.js';
import { HttpExecutorAdapter } from './http-adapter.js';
import { RpcExecutorAdapter } from './rpc-adapter.js';
import { StaticExecutorAdapter } from './static-adapter.js';

export { CliExecutorAdapter, parseModelListing, type CommandRunner } from './cli-adapter.js';
export { HttpExecutorAdapter } from './http-adapter.js';
export { RpcExecutorAdapter } from './rpc-adapter.js';
export { StaticExecutorAdapter } from './static-adapter.js';

/**
 * One factory per built-in transport
 */
export function createDefaultAdapterFactories(): AdapterFactories {
  return {
    http: descriptor => new HttpExecutorAdapter(descriptor),
    cli: descriptor => new CliExecutorAdapter(descriptor),
    rpc: descriptor => new RpcExecutorAdapter(descriptor),
    static: descriptor => new StaticExecutorAdapter(descriptor),
  };
}
