/**
 * Local keyword classifier. No I/O, so it cannot time out; used when no
 * external classifier is configured.
 */

import { CancelledError } from '../errors.js';
import { compareStrings } from '../shared/compare.js';
import {
  countCodeLines,
  countPhrases,
  getDefaultKeywordTables,
  type ContextTurn,
  type KeywordTables,
} from '../features/index.js';
import type { Classification, FallbackClassification, TaskClassifier } from './types.js';

interface RankedLabel {
  label: string;
  hits: number;
}

/**
 * Highest hit count wins; ties resolve lexically so output is deterministic
 */
function rank(lowerText: string, table: Record<string, string[]>): RankedLabel[] {
  return Object.entries(table)
    .map(([label, keywords]) => ({ label, hits: countPhrases(lowerText, keywords) }))
    .filter(entry => entry.hits > 0)
    .sort((a, b) => b.hits - a.hits || compareStrings(a.label, b.label));
}

export class HeuristicTaskClassifier implements TaskClassifier {
  readonly name = 'heuristic';
  private readonly tables: KeywordTables;

  constructor(
    private readonly defaults: FallbackClassification = { domain: 'general', action: 'chat' },
    tables?: KeywordTables
  ) {
    this.tables = tables ?? getDefaultKeywordTables();
  }

  async classify(prompt: string, context: readonly ContextTurn[], signal?: AbortSignal): Promise<Classification> {
    if (signal?.aborted) {
      throw new CancelledError('Cancelled before classification', { cause: signal.reason });
    }
    return this.classifySync(prompt, context);
  }

  classifySync(prompt: string, context: readonly ContextTurn[] = []): Classification {
    const lower = prompt.toLowerCase();
    const domains = rank(lower, this.tables.domains);
    const actions = rank(lower, this.tables.actions);

    // Code without any domain keyword still reads as programming
    if (domains.length === 0 && countCodeLines(prompt) > 0) {
      domains.push({ label: 'programming', hits: 1 });
    }

    const domain = domains[0];
    const action = actions[0];

    const signals: string[] = [];
    let confidence = 0.3;

    if (domain) {
      signals.push(`domain:${domain.label}(${domain.hits})`);
      confidence += Math.min(0.3, domain.hits * 0.15);
      // A close runner-up domain makes the label less certain
      const runnerUp = domains[1];
      if (runnerUp && runnerUp.hits === domain.hits) {
        confidence -= 0.1;
      }
    }
    if (action) {
      signals.push(`action:${action.label}(${action.hits})`);
      confidence += Math.min(0.3, action.hits * 0.1);
    }
    if (context.length > 0) {
      signals.push(`context:${context.length}`);
    }

    return {
      domain: domain?.label ?? this.defaults.domain,
      action: action?.label ?? this.defaults.action,
      confidence: Math.round(Math.min(0.95, Math.max(0, confidence)) * 100) / 100,
      reasoning: signals.length > 0 ? `keyword match ${signals.join(', ')}` : 'no keyword signals; default labels',
      source: 'heuristic',
    };
  }
}
