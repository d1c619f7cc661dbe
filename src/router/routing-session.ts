import { randomUUID } from 'node:crypto';
import type { Classification } from '../classifier/index.js';
import type { DecisionLog, DecisionRecord } from '../decision-log/index.js';
import { NoEligibleCandidatesError } from '../errors.js';
import type { QueryFeatures } from '../features/index.js';
import type { RoutewiseLogger } from '../logging/index.js';
import type { PolicyLookup } from '../policy/index.js';
import type { RegistrySnapshot } from '../registry/index.js';
import type { ScoringCandidate, ScoringEngine } from '../scoring/index.js';
import type { RouteDecision } from './types.js';

export interface SessionDependencies {
  registry: { snapshot(): RegistrySnapshot };
  scoring: ScoringEngine;
  decisions: DecisionLog;
  logger: RoutewiseLogger;
  now: () => number;
}

export interface SessionState {
  requestId: string;
  prompt: string;
  classification: Classification;
  features: QueryFeatures;
  policy: PolicyLookup;
  /** Why the policy lookup came back empty, when it failed */
  policyError?: Error;
  fallbackClassification: boolean;
  startedAt: number;
}

/**
 * Per-request routing state. Classification, features and the policy result
 * are computed once; each select() re-merges against the current registry
 * snapshot and picks the best candidate not yet excluded.
 */
export class RoutingSession {
  private readonly excluded = new Set<string>();
  private attempts = 0;
  private latest: RouteDecision | null = null;

  constructor(
    private readonly deps: SessionDependencies,
    private readonly state: SessionState
  ) {}

  get requestId(): string {
    return this.state.requestId;
  }

  get classification(): Classification {
    return this.state.classification;
  }

  get features(): QueryFeatures {
    return this.state.features;
  }

  get policy(): PolicyLookup {
    return this.state.policy;
  }

  get attempt(): number {
    return this.attempts;
  }

  /** Most recent successful selection */
  get decision(): RouteDecision | null {
    return this.latest;
  }

  excludedModels(): string[] {
    return [...this.excluded];
  }

  /**
   * Selects the next-ranked model. `excluded` adds to the ids excluded by
   * earlier calls; previously selected models are excluded automatically.
   * Every call writes its own decision record.
   *
   * @throws NoEligibleCandidatesError when nothing is left
   */
  select(excluded: Iterable<string> = []): RouteDecision {
    const selectStartedAt = this.deps.now();
    for (const id of excluded) {
      this.excluded.add(id);
    }
    if (this.latest) {
      this.excluded.add(this.latest.selectedModel);
    }
    this.attempts++;

    const snapshot = this.deps.registry.snapshot();
    const pool = this.merge(snapshot);
    const scores = this.deps.scoring.score(
      pool,
      this.state.features,
      this.state.classification
    );

    const decidedAt = this.deps.now();
    const latencyMs = this.attempts === 1 ? decidedAt - this.state.startedAt : decidedAt - selectStartedAt;
    const best = scores[0];
    const { classification } = this.state;

    const record: DecisionRecord = {
      id: randomUUID(),
      requestId: this.state.requestId,
      attempt: this.attempts,
      prompt: this.state.prompt,
      classification,
      features: this.state.features,
      candidates: pool.map(candidate => candidate.model.id),
      scores,
      excluded: [...this.excluded],
      selectedModel: best?.modelId ?? null,
      executorId: best?.executorId ?? null,
      fallbackClassification: this.state.fallbackClassification,
      policyMatch: this.state.policy.matched,
      stalePolicy: this.state.policy.stale,
      snapshotVersion: snapshot.version,
      createdAt: new Date(this.state.startedAt).toISOString(),
      decidedAt: new Date(decidedAt).toISOString(),
      latencyMs,
    };

    if (!best) {
      const error = new NoEligibleCandidatesError(
        classification.domain,
        classification.action,
        [...this.excluded],
        this.state.policyError ? { cause: this.state.policyError } : undefined
      );
      this.deps.decisions.append({ ...record, error: error.message });
      this.deps.logger.warn('No eligible candidates', {
        domain: classification.domain,
        action: classification.action,
        attempt: this.attempts,
        policyMatch: this.state.policy.matched,
        excluded: record.excluded,
        ...(this.state.policyError ? { policyError: this.state.policyError.message } : {}),
      });
      throw error;
    }

    this.deps.decisions.append(record);

    const decision: RouteDecision = {
      requestId: this.state.requestId,
      decisionId: record.id,
      attempt: this.attempts,
      selectedModel: best.modelId,
      executorId: best.executorId,
      candidates: scores,
      classification,
      confidence: classification.confidence,
      reasoning: best.explanation,
      latencyMs,
      fallbackClassification: this.state.fallbackClassification,
      policyMatch: this.state.policy.matched,
      stalePolicy: this.state.policy.stale,
      snapshotVersion: snapshot.version,
    };
    this.latest = decision;

    this.deps.logger.info('Routed request', {
      domain: classification.domain,
      action: classification.action,
      model: best.modelId,
      executor: best.executorId,
      attempt: this.attempts,
      pool: pool.length,
      latencyMs,
    });
    return decision;
  }

  /**
   * Policy order, restricted to live models, minus exclusions. Each candidate
   * keeps its position in the policy list as its rank.
   */
  private merge(snapshot: RegistrySnapshot): ScoringCandidate[] {
    const { candidates, priority } = this.state.policy;
    const pool: ScoringCandidate[] = [];
    candidates.forEach((id, policyRank) => {
      if (this.excluded.has(id)) return;
      const model = snapshot.byId.get(id);
      if (model) {
        pool.push({ model, priority, policyRank });
      }
    });
    return pool;
  }
}
