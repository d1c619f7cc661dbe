/**
 * Client for an external small classification model served over HTTP.
 */

import { z } from 'zod';
import { CancelledError, ClassificationError, ClassificationTimeoutError, withTimeout } from '../errors.js';
import type { ContextTurn } from '../features/index.js';
import type { Classification, TaskClassifier } from './types.js';

export interface HttpClassifierConfig {
  url: string;
  /** Hard bound on the whole call, in milliseconds */
  timeoutMs: number;
  apiKey?: string;
}

const ClassifierResponseSchema = z.object({
  domain: z.string().trim().min(1),
  action: z.string().trim().min(1),
  confidence: z.number().finite(),
  reasoning: z.string().optional(),
});

export class HttpTaskClassifier implements TaskClassifier {
  readonly name = 'http';

  constructor(private readonly config: HttpClassifierConfig) {}

  async classify(prompt: string, context: readonly ContextTurn[], signal?: AbortSignal): Promise<Classification> {
    const outcome = await withTimeout(this.config.timeoutMs, signal, async timeoutSignal => {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (this.config.apiKey) {
        headers['Authorization'] = `Bearer ${this.config.apiKey}`;
      }

      let response: Response;
      try {
        response = await fetch(this.config.url, {
          method: 'POST',
          headers,
          body: JSON.stringify({ prompt, context }),
          signal: timeoutSignal,
        });
      } catch (error) {
        if (timeoutSignal.aborted) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new ClassificationError(`Classifier request failed: ${message}`, { cause: error });
      }

      if (!response.ok) {
        throw new ClassificationError(`Classifier returned HTTP ${response.status}: ${response.statusText}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (timeoutSignal.aborted) throw error;
        throw new ClassificationError('Classifier returned a non-JSON response', { cause: error });
      }

      const parsed = ClassifierResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ClassificationError(`Malformed classifier response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
      }
      return parsed.data;
    });

    if (!outcome.ok) {
      if (outcome.reason === 'timeout') {
        throw new ClassificationTimeoutError(this.config.timeoutMs);
      }
      throw new CancelledError('Cancelled while awaiting the task classifier', { cause: outcome.cause });
    }

    const { domain, action, confidence, reasoning } = outcome.value;
    return {
      domain,
      action,
      confidence: Math.min(1, Math.max(0, confidence)),
      reasoning: reasoning ?? '',
      source: 'classifier',
    };
  }
}
