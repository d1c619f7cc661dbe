import type { ExecutorDescriptor, Transport } from '../config.js';

/**
 * A model served by one executor, as visible to routing
 */
export interface Model {
  id: string;
  executorId: string;
  displayName: string;
  /** USD per million tokens; 0 for free/local models */
  costPerMillionTokens: number;
  contextWindow: number;
  capabilities: readonly string[];
  healthy: boolean;
}

/**
 * What an adapter reports for a model. Missing fields are filled from
 * the executor's declared models, then from defaults.
 */
export interface DiscoveredModel {
  id: string;
  displayName?: string;
  costPerMillionTokens?: number;
  contextWindow?: number;
  capabilities?: string[];
}

/**
 * Two-method probe contract every transport implements
 */
export interface ExecutorAdapter {
  readonly transport: Transport;
  listModels(signal: AbortSignal): Promise<DiscoveredModel[]>;
  healthCheck(signal: AbortSignal): Promise<boolean>;
}

export type AdapterFactory = (descriptor: ExecutorDescriptor) => ExecutorAdapter;

export type AdapterFactories = Partial<Record<Transport, AdapterFactory>>;

export interface ExecutorState {
  id: string;
  transport: Transport;
  capabilities: readonly string[];
  live: boolean;
  registeredAt: number;
  lastProbedAt: number | null;
  lastSeenLiveAt: number | null;
  lastError: string | null;
  models: readonly Model[];
}

/**
 * Immutable view of healthy models on live executors
 */
export interface RegistrySnapshot {
  /** Increments on every registry mutation */
  version: number;
  takenAt: number;
  /** Sorted by model id, then cost, then executor id */
  models: readonly Model[];
  /** Preferred executor for each model id: cheapest, then lexical executor id */
  byId: ReadonlyMap<string, Model>;
}

export interface RegistryConfig {
  probeIntervalMs: number;
  probeTimeoutMs: number;
  gracePeriodMs: number;
}
