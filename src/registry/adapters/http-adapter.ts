/**
 * HTTP executor adapter for OpenAI-compatible backends
 * (vLLM, llama.cpp server, MLX server, hosted gateways).
 */

import { z } from 'zod';
import type { ExecutorDescriptor } from '../../config.js';
import { ProbeError } from '../../errors.js';
import type { DiscoveredModel, ExecutorAdapter } from '../types.js';

const ModelListSchema = z.object({
  data: z.array(z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    context_length: z.number().int().positive().optional(),
  }).passthrough()),
});

export class HttpExecutorAdapter implements ExecutorAdapter {
  readonly transport = 'http' as const;
  private readonly baseUrl: string;

  constructor(private readonly descriptor: ExecutorDescriptor) {
    if (!descriptor.endpoint) {
      throw new ProbeError(descriptor.id, 'http executor has no endpoint');
    }
    this.baseUrl = descriptor.endpoint.replace(/\/+$/, '');
  }

  /**
   * GET {endpoint}/health; any 2xx counts as healthy
   */
  async healthCheck(signal: AbortSignal): Promise<boolean> {
    const response = await fetch(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.headers(),
      signal,
    });
    return response.ok;
  }

  /**
   * GET {endpoint}/v1/models
   */
  async listModels(signal: AbortSignal): Promise<DiscoveredModel[]> {
    const response = await fetch(`${this.baseUrl}/v1/models`, {
      method: 'GET',
      headers: this.headers(),
      signal,
    });

    if (!response.ok) {
      throw new ProbeError(this.descriptor.id, `HTTP ${response.status}: ${response.statusText}`);
    }

    const parsed = ModelListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProbeError(this.descriptor.id, 'invalid model list response');
    }

    return parsed.data.data.map(model => ({
      id: model.id,
      ...(model.name !== undefined && { displayName: model.name }),
      ...(model.context_length !== undefined && { contextWindow: model.context_length }),
    }));
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.descriptor.apiKey) {
      headers['Authorization'] = `Bearer ${this.descriptor.apiKey}`;
    }
    return headers;
  }
}
