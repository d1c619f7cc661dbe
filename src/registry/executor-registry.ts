/**
 * Executor registry: tracks backends, the models they expose and their
 * liveness, refreshed by a background probe independent of request traffic.
 *
 * Readers only ever see a frozen RegistrySnapshot. Every mutation builds a new
 * snapshot and swaps the reference, so routing never waits on a probe.
 */

import { ExecutorDescriptorSchema, formatIssues, type ExecutorDescriptor } from '../config.js';
import { ConfigError, ProbeError, withTimeout } from '../errors.js';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import { compareStrings } from '../shared/compare.js';
import type {
  AdapterFactories,
  DiscoveredModel,
  ExecutorAdapter,
  ExecutorState,
  Model,
  RegistryConfig,
  RegistrySnapshot,
} from './types.js';

interface RegistryEntry {
  descriptor: ExecutorDescriptor;
  adapter: ExecutorAdapter;
  state: ExecutorState;
}

export interface ExecutorRegistryOptions {
  adapters: AdapterFactories;
  logger?: RoutewiseLogger;
  now?: () => number;
}

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  probeIntervalMs: 5000,
  probeTimeoutMs: 2000,
  gracePeriodMs: 60000,
};

const DEFAULT_CONTEXT_WINDOW = 8192;

export class ExecutorRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly adapters: AdapterFactories;
  private readonly logger: RoutewiseLogger;
  private readonly now: () => number;
  private current: RegistrySnapshot;
  private version = 0;
  private timer: NodeJS.Timeout | null = null;
  private probeRound: Promise<void> | null = null;

  constructor(
    private readonly config: RegistryConfig = DEFAULT_REGISTRY_CONFIG,
    options: ExecutorRegistryOptions
  ) {
    this.adapters = options.adapters;
    this.logger = options.logger ?? createComponentLogger('ExecutorRegistry');
    this.now = options.now ?? Date.now;
    this.current = this.buildSnapshot();
  }

  /**
   * Adds or replaces an executor. A replaced executor keeps its last-known
   * models (marked unhealthy) until its next probe.
   *
   * @throws ConfigError on a malformed descriptor or unsupported transport
   */
  register(input: unknown): ExecutorState {
    const parsed = ExecutorDescriptorSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid executor descriptor: ${issues.join('; ')}`, issues);
    }

    const descriptor = parsed.data;
    const factory = this.adapters[descriptor.transport];
    if (!factory) {
      throw new ConfigError(`No adapter for transport "${descriptor.transport}"`, [
        `transport: unsupported value ${descriptor.transport}`,
      ]);
    }

    let adapter: ExecutorAdapter;
    try {
      adapter = factory(descriptor);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot create ${descriptor.transport} adapter for ${descriptor.id}: ${message}`, [message]);
    }

    const previous = this.entries.get(descriptor.id);
    const state: ExecutorState = Object.freeze({
      id: descriptor.id,
      transport: descriptor.transport,
      capabilities: Object.freeze([...descriptor.capabilities]),
      live: false,
      registeredAt: this.now(),
      lastProbedAt: previous?.state.lastProbedAt ?? null,
      lastSeenLiveAt: previous?.state.lastSeenLiveAt ?? null,
      lastError: null,
      models: previous ? markUnhealthy(previous.state.models) : Object.freeze([]),
    });

    this.entries.set(descriptor.id, { descriptor, adapter, state });
    this.publish();

    this.logger.info(previous ? 'Executor re-registered' : 'Executor registered', {
      executorId: descriptor.id,
      transport: descriptor.transport,
    });
    return state;
  }

  /**
   * Removes an executor from future candidate pools. Idempotent.
   */
  deregister(id: string): boolean {
    const removed = this.entries.delete(id);
    if (removed) {
      this.publish();
      this.logger.info('Executor deregistered', { executorId: id });
    }
    return removed;
  }

  /**
   * Probes one executor. Failures only affect future snapshots.
   */
  async probe(id: string): Promise<ExecutorState | undefined> {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }

    const startedAt = this.now();
    let models: DiscoveredModel[] | null = null;
    let failure: string | null = null;

    try {
      const outcome = await withTimeout(this.config.probeTimeoutMs, undefined, async signal => {
        const healthy = await entry.adapter.healthCheck(signal);
        if (!healthy) {
          throw new ProbeError(id, 'health check reported unhealthy');
        }
        return entry.adapter.listModels(signal);
      });
      if (outcome.ok) {
        models = outcome.value;
      } else {
        failure = `timed out after ${this.config.probeTimeoutMs}ms`;
      }
    } catch (error) {
      failure = error instanceof Error ? error.message : String(error);
    }

    // Deregistered or replaced while the probe was in flight
    if (this.entries.get(id) !== entry) {
      return this.entries.get(id)?.state;
    }

    const probedAt = this.now();
    const state: ExecutorState = models
      ? Object.freeze({
          ...entry.state,
          live: true,
          lastProbedAt: probedAt,
          lastSeenLiveAt: probedAt,
          lastError: null,
          models: buildModels(entry.descriptor, models),
        })
      : Object.freeze({
          ...entry.state,
          live: false,
          lastProbedAt: probedAt,
          lastError: failure,
          models: markUnhealthy(entry.state.models),
        });

    if (!models && entry.state.live) {
      this.logger.warn('Executor became unhealthy', { executorId: id, error: failure });
    } else if (models && !entry.state.live) {
      this.logger.info('Executor is live', { executorId: id, models: models.length });
    }
    this.logger.debug('Probe complete', { executorId: id, live: state.live, durationMs: probedAt - startedAt });

    this.entries.set(id, { ...entry, state });
    this.publish();
    return state;
  }

  /**
   * Probes every executor concurrently, then evicts those past the grace
   * period. A round already in flight is joined, not duplicated.
   */
  probeAll(): Promise<void> {
    if (this.probeRound) {
      return this.probeRound;
    }

    const round = Promise.allSettled([...this.entries.keys()].map(id => this.probe(id)))
      .then(results => {
        for (const result of results) {
          if (result.status === 'rejected') {
            this.logger.error('Probe failed unexpectedly', result.reason instanceof Error ? result.reason : { reason: String(result.reason) });
          }
        }
        this.evictExpired();
      })
      .finally(() => {
        this.probeRound = null;
      });

    this.probeRound = round;
    return round;
  }

  /**
   * Removes executors that have not been live within the grace period
   */
  evictExpired(): string[] {
    const now = this.now();
    const evicted: string[] = [];

    for (const [id, entry] of this.entries) {
      if (entry.state.live) continue;
      const lastLive = entry.state.lastSeenLiveAt ?? entry.state.registeredAt;
      if (now - lastLive > this.config.gracePeriodMs) {
        this.entries.delete(id);
        evicted.push(id);
      }
    }

    if (evicted.length > 0) {
      this.publish();
      this.logger.warn('Evicted executors past grace period', { executors: evicted });
    }
    return evicted;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.probeAll().catch((error: unknown) => {
        this.logger.error('Probe round failed', error instanceof Error ? error : { error: String(error) });
      });
    }, this.config.probeIntervalMs);
    this.timer.unref();
    this.logger.info('Probe loop started', { intervalMs: this.config.probeIntervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Probe loop stopped');
    }
  }

  snapshot(): RegistrySnapshot {
    return this.current;
  }

  listExecutors(): ExecutorState[] {
    return [...this.entries.values()]
      .map(entry => entry.state)
      .sort((a, b) => compareStrings(a.id, b.id));
  }

  getExecutor(id: string): ExecutorState | undefined {
    return this.entries.get(id)?.state;
  }

  private publish(): void {
    this.version++;
    this.current = this.buildSnapshot();
  }

  private buildSnapshot(): RegistrySnapshot {
    const models: Model[] = [];
    for (const entry of this.entries.values()) {
      if (!entry.state.live) continue;
      for (const model of entry.state.models) {
        if (model.healthy) models.push(model);
      }
    }

    models.sort((a, b) =>
      compareStrings(a.id, b.id) ||
      a.costPerMillionTokens - b.costPerMillionTokens ||
      compareStrings(a.executorId, b.executorId)
    );

    const byId = new Map<string, Model>();
    for (const model of models) {
      if (!byId.has(model.id)) byId.set(model.id, model);
    }

    return Object.freeze({
      version: this.version,
      takenAt: this.now(),
      models: Object.freeze(models),
      byId,
    });
  }
}

function markUnhealthy(models: readonly Model[]): readonly Model[] {
  return Object.freeze(models.map(model => Object.freeze({ ...model, healthy: false })));
}

/**
 * Discovered models, with declared metadata taking precedence for cost
 * (backends rarely report their own price)
 */
function buildModels(descriptor: ExecutorDescriptor, discovered: DiscoveredModel[]): readonly Model[] {
  const declared = new Map(descriptor.models.map(model => [model.id, model]));
  const seen = new Set<string>();
  const models: Model[] = [];

  for (const found of discovered) {
    if (seen.has(found.id)) continue;
    seen.add(found.id);
    const declaration = declared.get(found.id);
    models.push(Object.freeze({
      id: found.id,
      executorId: descriptor.id,
      displayName: declaration?.displayName ?? found.displayName ?? found.id,
      costPerMillionTokens: declaration?.costPerMillionTokens ?? found.costPerMillionTokens ?? 0,
      contextWindow: declaration?.contextWindow ?? found.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
      capabilities: Object.freeze([...(declaration?.capabilities ?? found.capabilities ?? [])]),
      healthy: true,
    }));
  }

  return Object.freeze(models);
}
