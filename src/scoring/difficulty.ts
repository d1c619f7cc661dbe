import type { Classification } from '../classifier/index.js';
import { featureVector, type QueryFeatures } from '../features/index.js';

/**
 * Projects a query onto the checkpoint's dimensions. Must return exactly
 * one value per dimension, in order.
 */
export interface DifficultyMapping {
  difficulty(features: QueryFeatures, classification: Classification, dimensions: readonly string[]): number[];
}

/**
 * Default projection:
 *
 * | dimension       | value                                                   |
 * |-----------------|---------------------------------------------------------|
 * | `length`        | min(1, tokenEstimate / 4000)                            |
 * | `complexity`    | features.complexity                                     |
 * | `code`          | 0 without code, else max(0.25, min(1, codeLines / 50))  |
 * | `tools`         | 1 when tools are needed                                 |
 * | `depth`         | min(1, conversationDepth / 10)                          |
 * | `ambiguity`     | features.ambiguity                                      |
 * | `domain:<name>` | 1 when detected or classified as that domain            |
 * | `action:<name>` | 1 when classified as that action                        |
 * | anything else   | 0                                                       |
 */
export class FeatureDifficultyMapping implements DifficultyMapping {
  difficulty(features: QueryFeatures, classification: Classification, dimensions: readonly string[]): number[] {
    const vector: Record<string, number> = featureVector(features);

    return dimensions.map(dimension => {
      if (dimension.startsWith('domain:')) {
        const name = dimension.slice('domain:'.length);
        return features.domainIndicators.includes(name) || classification.domain === name ? 1 : 0;
      }
      if (dimension.startsWith('action:')) {
        return classification.action === dimension.slice('action:'.length) ? 1 : 0;
      }
      return Object.hasOwn(vector, dimension) ? vector[dimension] ?? 0 : 0;
    });
  }
}
