/**
 * JSON-RPC 2.0 executor adapter. The backend exposes two methods over
 * HTTP POST: `health` and `listModels`.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ExecutorDescriptor } from '../../config.js';
import { ProbeError } from '../../errors.js';
import type { DiscoveredModel, ExecutorAdapter } from '../types.js';

// Error variant first: `result: z.unknown()` would also accept an error payload.
const RpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]),
    error: z.object({ code: z.number(), message: z.string() }),
  }),
  z.object({ jsonrpc: z.literal('2.0'), id: z.union([z.string(), z.number(), z.null()]), result: z.unknown() }),
]);

const HealthResultSchema = z.union([
  z.boolean(),
  z.object({ healthy: z.boolean() }).passthrough(),
]);

const ModelsResultSchema = z.array(z.object({
  id: z.string().min(1),
  displayName: z.string().optional(),
  costPerMillionTokens: z.number().min(0).optional(),
  contextWindow: z.number().int().positive().optional(),
  capabilities: z.array(z.string()).optional(),
}));

export class RpcExecutorAdapter implements ExecutorAdapter {
  readonly transport = 'rpc' as const;
  private readonly endpoint: string;

  constructor(private readonly descriptor: ExecutorDescriptor) {
    if (!descriptor.endpoint) {
      throw new ProbeError(descriptor.id, 'rpc executor has no endpoint');
    }
    this.endpoint = descriptor.endpoint;
  }

  async healthCheck(signal: AbortSignal): Promise<boolean> {
    const parsed = HealthResultSchema.safeParse(await this.call('health', signal));
    if (!parsed.success) {
      throw new ProbeError(this.descriptor.id, 'invalid health result');
    }
    return typeof parsed.data === 'boolean' ? parsed.data : parsed.data.healthy;
  }

  async listModels(signal: AbortSignal): Promise<DiscoveredModel[]> {
    const parsed = ModelsResultSchema.safeParse(await this.call('listModels', signal));
    if (!parsed.success) {
      throw new ProbeError(this.descriptor.id, 'invalid listModels result');
    }
    return parsed.data;
  }

  private async call(method: string, signal: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.descriptor.apiKey) {
      headers['x-api-key'] = this.descriptor.apiKey;
    }

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({ jsonrpc: '2.0', id: randomUUID(), method, params: {} }),
      signal,
    });

    if (!response.ok) {
      throw new ProbeError(this.descriptor.id, `${method} failed (${response.status} ${response.statusText})`);
    }

    const parsed = RpcResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProbeError(this.descriptor.id, `${method} returned a non JSON-RPC payload`);
    }
    if ('error' in parsed.data) {
      throw new ProbeError(this.descriptor.id, `${method}: ${parsed.data.error.message}`);
    }
    return parsed.data.result;
  }
}
