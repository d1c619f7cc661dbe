export {
  FeatureExtractor,
  featureVector,
  FEATURE_DIMENSIONS,
  DEFAULT_FEATURE_CONFIG,
  type FeatureDimension,
  type FeatureExtractorConfig,
  type QueryFeatures,
  type ContextTurn,
  type TurnRole,
} from './feature-extractor.js';

export {
  loadKeywordTables,
  getDefaultKeywordTables,
  containsPhrase,
  countPhrases,
  countCodeLines,
  DEFAULT_KEYWORDS_PATH,
  TOOL_KEYWORDS,
  REASONING_KEYWORDS,
  type KeywordTables,
} from './signals.js';
