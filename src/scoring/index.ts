export {
  AbilityStore,
  AbilityCheckpointSchema,
  EMPTY_CHECKPOINT,
  type AbilityCheckpoint,
} from './ability-store.js';

export { FeatureDifficultyMapping, type DifficultyMapping } from './difficulty.js';

export {
  ScoringEngine,
  DEFAULT_SCORING_CONFIG,
  compareScores,
  effectiveCost,
  clampProbability,
  sigmoid,
  type CandidateScore,
  type ScoringCandidate,
  type ScoringConfig,
  type ScoringEngineOptions,
} from './scoring-engine.js';
