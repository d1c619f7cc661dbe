import type { Classification, FallbackClassification } from '../classifier/index.js';
import type { ContextTurn } from '../features/index.js';
import type { PolicyMatch } from '../policy/index.js';
import type { CandidateScore } from '../scoring/index.js';

export interface RouteRequest {
  prompt: string;
  /** Recent conversation turns, oldest first */
  context?: ContextTurn[];
  /** Models the caller already knows are unusable */
  excludedModelIds?: string[];
  /** Caller-supplied id; generated when absent */
  requestId?: string;
}

export interface RouteOptions {
  signal?: AbortSignal;
  /** Abort the classify and policy steps after this many ms */
  deadlineMs?: number;
}

/**
 * Result of routing one request
 */
export interface RouteDecision {
  requestId: string;
  decisionId: string;
  attempt: number;
  selectedModel: string;
  executorId: string;
  /** Scored pool, best first */
  candidates: CandidateScore[];
  classification: Classification;
  /** Classifier confidence (0.0 - 1.0) */
  confidence: number;
  reasoning: string;
  latencyMs: number;
  fallbackClassification: boolean;
  policyMatch: PolicyMatch;
  stalePolicy: boolean;
  snapshotVersion: number;
}

export interface RouterConfig {
  fallback: FallbackClassification;
}
