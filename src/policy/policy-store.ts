/**
 * Cached policy table with TTL refresh and stale fallback.
 *
 * The whole table is fetched at once and swapped by reference. Concurrent
 * misses share one in-flight fetch; a caller that cancels stops waiting but
 * does not abort the shared fetch.
 */

import { formatIssues, PolicySchema, type Policy } from '../config.js';
import { CancelledError, ConfigError, PolicyUnavailableError, withTimeout } from '../errors.js';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import { compareStrings } from '../shared/compare.js';
import {
  policyKey,
  WILDCARD,
  type PolicyLookup,
  type PolicySource,
  type PolicyStoreConfig,
} from './types.js';

interface PolicyTable {
  byKey: ReadonlyMap<string, Policy>;
  loadedAt: number;
}

export interface PolicyStoreOptions {
  logger?: RoutewiseLogger;
  now?: () => number;
}

export const DEFAULT_POLICY_STORE_CONFIG: PolicyStoreConfig = {
  ttlMs: 30000,
  fetchTimeoutMs: 1000,
};

/**
 * Rejects with CancelledError when `signal` aborts; `promise` keeps running
 */
function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError('Cancelled while waiting for policies', { cause: signal.reason }));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancelledError('Cancelled while waiting for policies', { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class PolicyStore {
  private table: PolicyTable | null = null;
  private inflight: Promise<PolicyTable> | null = null;
  /** Bumped on every write so a fetch started before it cannot be treated as fresh */
  private generation = 0;
  private readonly logger: RoutewiseLogger;
  private readonly now: () => number;

  constructor(
    private readonly source: PolicySource,
    private readonly config: PolicyStoreConfig = DEFAULT_POLICY_STORE_CONFIG,
    options: PolicyStoreOptions = {}
  ) {
    this.logger = options.logger ?? createComponentLogger('PolicyStore');
    this.now = options.now ?? Date.now;
  }

  /**
   * Candidate list for a classification.
   * Resolution: exact, then (domain, "*"), then ("*", "*"), then empty.
   *
   * @throws PolicyUnavailableError when no table was ever loaded and the fetch fails
   * @throws CancelledError when `signal` aborts while waiting on the fetch
   */
  async getCandidates(domain: string, action: string, signal?: AbortSignal): Promise<PolicyLookup> {
    const { table, stale } = await this.ensureTable(signal);
    return resolve(table, domain, action, stale);
  }

  async listPolicies(signal?: AbortSignal): Promise<Policy[]> {
    const { table } = await this.ensureTable(signal);
    return [...table.byKey.values()]
      .map(policy => ({ ...policy, candidates: [...policy.candidates] }))
      .sort((a, b) => compareStrings(a.domain, b.domain) || compareStrings(a.action, b.action));
  }

  /**
   * @throws ConfigError on a malformed policy
   */
  async upsertPolicy(input: unknown): Promise<Policy> {
    const parsed = PolicySchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid policy: ${issues.join('; ')}`, issues);
    }

    await this.source.put(parsed.data);
    this.invalidate();
    this.logger.info('Policy upserted', {
      domain: parsed.data.domain,
      action: parsed.data.action,
      candidates: parsed.data.candidates.length,
    });
    return parsed.data;
  }

  async deletePolicy(domain: string, action: string): Promise<boolean> {
    const removed = await this.source.delete(domain, action);
    if (removed) {
      this.invalidate();
      this.logger.info('Policy deleted', { domain, action });
    }
    return removed;
  }

  /**
   * Expires the cached table. It is still served as stale if the next fetch fails.
   */
  invalidate(): void {
    this.generation++;
    if (this.table) {
      this.table = { ...this.table, loadedAt: Number.NEGATIVE_INFINITY };
    }
  }

  getStats(): { policies: number; loadedAt: number | null; stale: boolean; fetching: boolean } {
    return {
      policies: this.table?.byKey.size ?? 0,
      loadedAt: this.table && Number.isFinite(this.table.loadedAt) ? this.table.loadedAt : null,
      stale: this.table ? this.isExpired(this.table) : true,
      fetching: this.inflight !== null,
    };
  }

  private async ensureTable(signal?: AbortSignal): Promise<{ table: PolicyTable; stale: boolean }> {
    if (signal?.aborted) {
      throw new CancelledError('Cancelled before policy lookup', { cause: signal.reason });
    }

    const cached = this.table;
    if (cached && !this.isExpired(cached)) {
      return { table: cached, stale: false };
    }

    try {
      const table = await abandonOnAbort(this.inflight ?? this.startFetch(), signal);
      return { table, stale: false };
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const fallback = this.table;
      if (fallback) {
        this.logger.warn('Policy refresh failed, serving stale table', {
          error: error instanceof Error ? error.message : String(error),
          policies: fallback.byKey.size,
        });
        return { table: fallback, stale: true };
      }
      if (error instanceof PolicyUnavailableError) {
        throw error;
      }
      throw new PolicyUnavailableError('Policy store unreachable and no cached policies', { cause: error });
    }
  }

  private startFetch(): Promise<PolicyTable> {
    const generation = this.generation;
    const fetchPromise = (async (): Promise<PolicyTable> => {
      const outcome = await withTimeout(this.config.fetchTimeoutMs, undefined, signal => this.source.loadAll(signal));
      if (!outcome.ok) {
        throw new PolicyUnavailableError(`Policy fetch timed out after ${this.config.fetchTimeoutMs}ms`, {
          cause: outcome.cause,
        });
      }

      const byKey = new Map<string, Policy>();
      for (const policy of outcome.value) {
        byKey.set(policyKey(policy.domain, policy.action), Object.freeze({
          ...policy,
          candidates: [...policy.candidates],
        }));
      }
      const table: PolicyTable = { byKey, loadedAt: this.now() };

      if (generation === this.generation) {
        this.table = table;
      } else {
        // Written to while fetching: keep it, but refetch on next read
        this.table = { ...table, loadedAt: Number.NEGATIVE_INFINITY };
      }
      this.logger.debug('Policy table refreshed', { source: this.source.name, policies: byKey.size });
      return table;
    })();

    const shared = fetchPromise.finally(() => {
      if (this.inflight === shared) {
        this.inflight = null;
      }
    });
    // Every waiter may have abandoned the fetch; keep it from surfacing as unhandled.
    shared.catch(() => undefined);
    this.inflight = shared;
    return shared;
  }

  private isExpired(table: PolicyTable): boolean {
    return this.now() - table.loadedAt > this.config.ttlMs;
  }
}

function resolve(table: PolicyTable, domain: string, action: string, stale: boolean): PolicyLookup {
  const attempts: Array<[string, string, PolicyLookup['matched']]> = [
    [domain, action, 'exact'],
    [domain, WILDCARD, 'domain'],
    [WILDCARD, WILDCARD, 'default'],
  ];

  for (const [d, a, matched] of attempts) {
    const policy = table.byKey.get(policyKey(d, a));
    if (policy) {
      return {
        candidates: [...new Set(policy.candidates)],
        priority: policy.priority,
        matched,
        stale,
      };
    }
  }

  return { candidates: [], priority: 0, matched: 'none', stale };
}
