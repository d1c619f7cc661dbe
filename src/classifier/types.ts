import type { ContextTurn } from '../features/index.js';

export type ClassificationSource = 'classifier' | 'heuristic' | 'fallback';

export interface Classification {
  domain: string;
  action: string;
  /** 0.0 - 1.0 */
  confidence: number;
  reasoning: string;
  source: ClassificationSource;
}

/**
 * One bounded call: prompt (+context) in, domain/action out.
 * Implementations reject with ClassificationTimeoutError, ClassificationError
 * or CancelledError.
 */
export interface TaskClassifier {
  readonly name: string;
  classify(prompt: string, context: readonly ContextTurn[], signal?: AbortSignal): Promise<Classification>;
}

export interface FallbackClassification {
  domain: string;
  action: string;
}

export function fallbackClassification(fallback: FallbackClassification, reason: string): Classification {
  return {
    domain: fallback.domain,
    action: fallback.action,
    confidence: 0,
    reasoning: `fallback classification: ${reason}`,
    source: 'fallback',
  };
}
