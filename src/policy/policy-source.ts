/**
 * Policy sources: an in-process table, and a REST backend reached over fetch
 */

import { z } from 'zod';
import { PolicySchema, type Policy } from '../config.js';
import { policyKey, type PolicySource } from './types.js';

export class InMemoryPolicySource implements PolicySource {
  readonly name = 'memory';
  private readonly policies = new Map<string, Policy>();

  constructor(seed: readonly Policy[] = []) {
    for (const policy of seed) {
      this.policies.set(policyKey(policy.domain, policy.action), clonePolicy(policy));
    }
  }

  async loadAll(signal: AbortSignal): Promise<Policy[]> {
    signal.throwIfAborted();
    return [...this.policies.values()].map(clonePolicy);
  }

  async put(policy: Policy): Promise<void> {
    this.policies.set(policyKey(policy.domain, policy.action), clonePolicy(policy));
  }

  async delete(domain: string, action: string): Promise<boolean> {
    return this.policies.delete(policyKey(domain, action));
  }
}

function clonePolicy(policy: Policy): Policy {
  return { ...policy, candidates: [...policy.candidates] };
}

const PolicyListSchema = z.union([
  z.array(PolicySchema),
  z.object({ policies: z.array(PolicySchema) }).transform(body => body.policies),
]);

export interface HttpPolicySourceConfig {
  /** Base URL; policies live under `{url}/policies` */
  url: string;
  apiKey?: string;
}

/**
 * REST policy backend:
 * - `GET {url}/policies` returns `Policy[]` or `{ policies: Policy[] }`
 * - `PUT {url}/policies` upserts one policy
 * - `DELETE {url}/policies/:domain/:action` removes one (404 when absent)
 */
export class HttpPolicySource implements PolicySource {
  readonly name = 'http';
  private readonly baseUrl: string;

  constructor(private readonly config: HttpPolicySourceConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
  }

  async loadAll(signal: AbortSignal): Promise<Policy[]> {
    const response = await fetch(`${this.baseUrl}/policies`, {
      method: 'GET',
      headers: this.headers(),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Policy backend returned HTTP ${response.status}`);
    }

    const parsed = PolicyListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Malformed policy list: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data;
  }

  async put(policy: Policy, signal?: AbortSignal): Promise<void> {
    const response = await fetch(`${this.baseUrl}/policies`, {
      method: 'PUT',
      headers: this.headers(),
      body: JSON.stringify(policy),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Policy backend rejected upsert: HTTP ${response.status}`);
    }
  }

  async delete(domain: string, action: string, signal?: AbortSignal): Promise<boolean> {
    const response = await fetch(
      `${this.baseUrl}/policies/${encodeURIComponent(domain)}/${encodeURIComponent(action)}`,
      { method: 'DELETE', headers: this.headers(), signal }
    );
    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      throw new Error(`Policy backend rejected delete: HTTP ${response.status}`);
    }
    return true;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }
}
