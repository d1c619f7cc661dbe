/**
 * routewise - picks the best live model backend for each LLM request by
 * weighing predicted success against cost.
 *
 * @example
 * ```typescript
 * import { RoutewiseService, mergeWithDefaults } from 'routewise';
 *
 * const service = new RoutewiseService(mergeWithDefaults({
 *   registry: { executors: [{ id: 'local', transport: 'cli', command: 'ollama' }] },
 *   policy: { policies: [{ domain: '*', action: '*', candidates: ['llama3'] }] },
 * }));
 * await service.start();
 * const decision = await service.router.route({ prompt: 'Summarize this report' });
 * ```
 */

export * from './errors.js';
export {
  DEFAULT_CONFIG,
  ExecutorDescriptorSchema,
  PolicySchema,
  RoutewiseConfigSchema,
  TRANSPORTS,
  formatIssues,
  loadConfig,
  mergeWithDefaults,
  validateConfig,
  type ExecutorDescriptor,
  type ExecutorDescriptorInput,
  type ModelDeclaration,
  type RoutewiseConfig,
  type RoutewiseConfigInput,
  type Transport,
} from './config.js';

export * from './registry/index.js';
export * from './features/index.js';
export * from './classifier/index.js';
export * from './policy/index.js';
export * from './scoring/index.js';
export * from './decision-log/index.js';
export * from './router/index.js';
export * from './admin/index.js';
export { RoutewiseService, type ServiceOverrides, type StartOptions } from './service.js';
export { compareStrings } from './shared/compare.js';

export {
  RoutewiseLogger,
  createLogger,
  createComponentLogger,
  LoggerConfigs,
  correlationContext,
  type LoggerConfig,
  type LogLevel,
} from './logging/index.js';
