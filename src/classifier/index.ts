/**
 * Task classification: labels a request with a (domain, action) pair.
 *
 * @example
 * ```typescript
 * const classifier = new HttpTaskClassifier({ url: 'http://127.0.0.1:8010/classify', timeoutMs: 300 });
 * const result = await classifier.classify('Write a function that parses CSV', []);
 * // => { domain: 'programming', action: 'code-generation', confidence: 0.91, ... }
 * ```
 */

export {
  fallbackClassification,
  type Classification,
  type ClassificationSource,
  type FallbackClassification,
  type TaskClassifier,
} from './types.js';

export { HttpTaskClassifier, type HttpClassifierConfig } from './http-classifier.js';
export { HeuristicTaskClassifier } from './heuristic-classifier.js';
