import type { Classification } from '../classifier/index.js';
import type { QueryFeatures } from '../features/index.js';
import type { PolicyMatch } from '../policy/index.js';
import type { CandidateScore } from '../scoring/index.js';

export interface DecisionOutcome {
  success: boolean;
  /** Execution latency reported by the caller */
  latencyMs?: number;
  error?: string;
  /** ISO timestamp */
  recordedAt: string;
}

export type DecisionOutcomeInput = Omit<DecisionOutcome, 'recordedAt'>;

export interface DecisionRecord {
  id: string;
  requestId: string;
  /** 1 for the first selection of a request, +1 for each retry */
  attempt: number;
  prompt: string;
  classification: Classification;
  features: QueryFeatures;
  /** Merged pool in policy order */
  candidates: readonly string[];
  scores: readonly CandidateScore[];
  excluded: readonly string[];
  /** null when no candidate was eligible */
  selectedModel: string | null;
  executorId: string | null;
  fallbackClassification: boolean;
  policyMatch: PolicyMatch;
  stalePolicy: boolean;
  snapshotVersion: number;
  /** ISO timestamp of request start */
  createdAt: string;
  /** ISO timestamp of selection */
  decidedAt: string;
  latencyMs: number;
  error?: string;
  outcome?: DecisionOutcome;
}

export type DecisionLogEntry =
  | { type: 'decision'; record: DecisionRecord }
  | { type: 'outcome'; decisionId: string; outcome: DecisionOutcome };

/**
 * Durable destination for decision log entries. Called from the background
 * flush only.
 */
export interface DecisionSink {
  readonly name: string;
  write(entries: readonly DecisionLogEntry[]): Promise<void>;
}

export interface DecisionLogConfig {
  /** Persist to the sink; the in-memory ring is kept either way */
  enabled: boolean;
  flushIntervalMs: number;
  flushBatchSize: number;
  ringSize: number;
  maxBuffered: number;
}
