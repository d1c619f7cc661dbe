/**
 * Ability-vs-difficulty scoring with a cost divisor.
 *
 * p = sigmoid(Σ wᵢ(aᵢ − dᵢ) − penalty), clamped to (0, 1),
 * weighted = p / max(1 + costWeight·c, ε). A cost of 0 leaves p untouched.
 */

import type { Classification } from '../classifier/index.js';
import type { QueryFeatures } from '../features/index.js';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import type { Model } from '../registry/index.js';
import { compareStrings } from '../shared/compare.js';
import { AbilityStore } from './ability-store.js';
import { FeatureDifficultyMapping, type DifficultyMapping } from './difficulty.js';

export interface ScoringConfig {
  costWeight: number;
  costEpsilon: number;
  missingAbilityPenalty: number;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  costWeight: 0.1,
  costEpsilon: 1e-6,
  missingAbilityPenalty: 1.0,
};

export interface ScoringCandidate {
  model: Model;
  /** Priority of the policy that nominated the candidate */
  priority: number;
  /** Position in the policy's candidate list, 0 first */
  policyRank: number;
}

export interface CandidateScore {
  modelId: string;
  executorId: string;
  probability: number;
  /** Effective cost per million tokens after sanitizing */
  cost: number;
  weightedScore: number;
  priority: number;
  policyRank: number;
  abilityMissing: boolean;
  explanation: string;
}

export interface ScoringEngineOptions {
  abilities?: AbilityStore;
  mapping?: DifficultyMapping;
  logger?: RoutewiseLogger;
}

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

/**
 * Keeps p strictly inside (0, 1) so a saturated logit still leaves the cost
 * term something to divide
 */
export function clampProbability(p: number): number {
  return Math.min(1 - Number.EPSILON, Math.max(Number.EPSILON, p));
}

/**
 * Negative or non-finite costs count as free
 */
export function effectiveCost(cost: number): number {
  return Number.isFinite(cost) && cost > 0 ? cost : 0;
}

/**
 * Weighted score desc, then policy priority desc, then policy order, then
 * model id asc
 */
export function compareScores(a: CandidateScore, b: CandidateScore): number {
  return (
    b.weightedScore - a.weightedScore ||
    b.priority - a.priority ||
    a.policyRank - b.policyRank ||
    compareStrings(a.modelId, b.modelId) ||
    compareStrings(a.executorId, b.executorId)
  );
}

function fmt(value: number): string {
  return value.toFixed(4);
}

export class ScoringEngine {
  readonly abilities: AbilityStore;
  private readonly mapping: DifficultyMapping;
  private readonly logger: RoutewiseLogger;

  constructor(
    private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG,
    options: ScoringEngineOptions = {}
  ) {
    this.abilities = options.abilities ?? new AbilityStore();
    this.mapping = options.mapping ?? new FeatureDifficultyMapping();
    this.logger = options.logger ?? createComponentLogger('ScoringEngine');
  }

  /**
   * Scores and ranks the given candidates. Pure with respect to its inputs
   * and the current checkpoint.
   */
  score(
    candidates: readonly ScoringCandidate[],
    features: QueryFeatures,
    classification: Classification
  ): CandidateScore[] {
    if (candidates.length === 0) {
      return [];
    }

    const checkpoint = this.abilities.current();
    const dimensions = checkpoint.dimensions;
    const difficulty = this.mapping.difficulty(features, classification, dimensions);
    const weights = checkpoint.weights ?? dimensions.map(() => 1);

    const scored = candidates.map(({ model, priority, policyRank }): CandidateScore => {
      const ability = this.abilities.get(model.id);
      const abilityMissing = ability === undefined;

      let z = 0;
      for (let i = 0; i < dimensions.length; i++) {
        z += (weights[i] ?? 1) * ((ability?.[i] ?? 0) - (difficulty[i] ?? 0));
      }
      if (abilityMissing) {
        z -= this.config.missingAbilityPenalty;
      }

      const probability = clampProbability(sigmoid(z));
      const cost = effectiveCost(model.costPerMillionTokens);
      const divisor = Math.max(1 + this.config.costWeight * cost, this.config.costEpsilon);

      return {
        modelId: model.id,
        executorId: model.executorId,
        probability,
        cost,
        weightedScore: probability / divisor,
        priority,
        policyRank,
        abilityMissing,
        explanation: '',
      };
    });

    scored.sort(compareScores);

    const missing = scored.filter(score => score.abilityMissing).map(score => score.modelId);
    if (missing.length > 0) {
      this.logger.debug('Scoring without ability data', { models: missing, checkpoint: checkpoint.version });
    }

    const label = `${classification.domain}/${classification.action}`;
    return scored.map((score, index) => ({
      ...score,
      explanation: explain(label, score, index === 0 ? scored[1] : scored[0], index === 0),
    }));
  }
}

function explain(label: string, score: CandidateScore, other: CandidateScore | undefined, isTop: boolean): string {
  const parts = [
    `${label}: p=${fmt(score.probability)}`,
    `cost=${score.cost}/M`,
    `score=${fmt(score.weightedScore)}`,
  ];
  if (score.abilityMissing) {
    parts.push('no ability data');
  }
  if (!other) {
    parts.push('only candidate');
  } else if (isTop) {
    parts.push(`ahead of ${other.modelId} (${fmt(other.weightedScore)})`);
  } else {
    parts.push(`behind ${other.modelId} (${fmt(other.weightedScore)})`);
  }
  return parts.join(', ');
}
