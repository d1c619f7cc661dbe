import type { ExecutorDescriptor } from '../../config.js';
import type { DiscoveredModel, ExecutorAdapter } from '../types.js';

/**
 * Executor whose models are declared up front, such as an in-process
 * backend. Always reports healthy.
 */
export class StaticExecutorAdapter implements ExecutorAdapter {
  readonly transport = 'static' as const;

  constructor(private readonly descriptor: ExecutorDescriptor) {}

  async listModels(): Promise<DiscoveredModel[]> {
    return this.descriptor.models.map(model => ({
      id: model.id,
      ...(model.displayName !== undefined && { displayName: model.displayName }),
      ...(model.costPerMillionTokens !== undefined && { costPerMillionTokens: model.costPerMillionTokens }),
      ...(model.contextWindow !== undefined && { contextWindow: model.contextWindow }),
      ...(model.capabilities !== undefined && { capabilities: [...model.capabilities] }),
    }));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
