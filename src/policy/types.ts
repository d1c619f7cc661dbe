import type { Policy } from '../config.js';

export type { Policy, PolicyInput } from '../config.js';

/** Wildcard for domain-only and global default policies */
export const WILDCARD = '*';

export type PolicyMatch = 'exact' | 'domain' | 'default' | 'none';

export interface PolicyLookup {
  /** Preferred model ids, most preferred first; may name models that are not live */
  candidates: readonly string[];
  priority: number;
  matched: PolicyMatch;
  /** Served from a table past its TTL because the refresh failed */
  stale: boolean;
}

/**
 * Backing store for the policy table. Reads happen on cache refresh only.
 */
export interface PolicySource {
  readonly name: string;
  loadAll(signal: AbortSignal): Promise<Policy[]>;
  put(policy: Policy, signal?: AbortSignal): Promise<void>;
  delete(domain: string, action: string, signal?: AbortSignal): Promise<boolean>;
}

export interface PolicyStoreConfig {
  ttlMs: number;
  fetchTimeoutMs: number;
}

export function policyKey(domain: string, action: string): string {
  return `${domain}\u0000${action}`;
}
