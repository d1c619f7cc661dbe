/**
 * Difficulty features for a prompt and its recent turns.
 *
 * Pure and synchronous: no I/O, no clock, no randomness. Identical input
 * always yields an identical QueryFeatures value.
 */

import {
  IMPERATIVE_VERBS,
  REASONING_KEYWORDS,
  TOOL_KEYWORDS,
  VAGUE_TERMS,
  containsPhrase,
  countCodeLines,
  countPhrases,
  getDefaultKeywordTables,
  type KeywordTables,
} from './signals.js';

export type TurnRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ContextTurn {
  role: TurnRole;
  content: string;
}

export interface QueryFeatures {
  tokenEstimate: number;
  /** 0 (trivial) to 1 (hard) */
  complexity: number;
  hasCode: boolean;
  codeLines: number;
  /** Sorted domain names whose keywords appear in the prompt */
  domainIndicators: string[];
  needsTools: boolean;
  /** Context turns considered, after bounding */
  conversationDepth: number;
  /** 0 (precise) to 1 (vague) */
  ambiguity: number;
}

/**
 * Fixed order of the numeric feature vector
 */
export const FEATURE_DIMENSIONS = ['length', 'complexity', 'code', 'tools', 'depth', 'ambiguity'] as const;
export type FeatureDimension = (typeof FEATURE_DIMENSIONS)[number];

export interface FeatureExtractorConfig {
  maxContextTurns: number;
}

export const DEFAULT_FEATURE_CONFIG: FeatureExtractorConfig = {
  maxContextTurns: 8,
};

/** Rough chars-per-token ratio for English text and code */
const CHARS_PER_TOKEN = 4;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export class FeatureExtractor {
  private readonly tables: KeywordTables;

  constructor(
    private readonly config: FeatureExtractorConfig = DEFAULT_FEATURE_CONFIG,
    tables?: KeywordTables
  ) {
    this.tables = tables ?? getDefaultKeywordTables();
  }

  extract(prompt: string, context: readonly ContextTurn[] = []): QueryFeatures {
    const turns = this.config.maxContextTurns > 0 ? context.slice(-this.config.maxContextTurns) : [];
    const lower = prompt.toLowerCase();

    const contextChars = turns.reduce((sum, turn) => sum + turn.content.length, 0);
    const tokenEstimate = Math.ceil((prompt.length + contextChars) / CHARS_PER_TOKEN);

    const codeLines = countCodeLines(prompt);
    const hasCode = codeLines > 0 || /`[^`\n]+`/.test(prompt);

    const domainIndicators = this.detectDomains(lower, hasCode);
    const needsTools = countPhrases(lower, TOOL_KEYWORDS) > 0 || turns.some(turn => turn.role === 'tool');

    const complexity = this.scoreComplexity(lower, tokenEstimate, hasCode, codeLines, domainIndicators.length);
    const ambiguity = this.scoreAmbiguity(prompt, lower, turns.length, domainIndicators.length);

    return {
      tokenEstimate,
      complexity,
      hasCode,
      codeLines,
      domainIndicators,
      needsTools,
      conversationDepth: turns.length,
      ambiguity,
    };
  }

  /**
   * Domains whose keyword table matches; code always implies programming
   */
  detectDomains(lowerText: string, hasCode = false): string[] {
    const domains = new Set<string>();
    for (const [domain, keywords] of Object.entries(this.tables.domains)) {
      if (keywords.some(keyword => containsPhrase(lowerText, keyword))) {
        domains.add(domain);
      }
    }
    if (hasCode) {
      domains.add('programming');
    }
    return [...domains].sort();
  }

  private scoreComplexity(
    lower: string,
    tokenEstimate: number,
    hasCode: boolean,
    codeLines: number,
    domainCount: number
  ): number {
    let score = Math.min(1, tokenEstimate / 2000) * 0.3;

    if (hasCode) {
      score += 0.2 + Math.min(0.1, codeLines / 200);
    }

    const questionCount = (lower.match(/\?/g) ?? []).length;
    if (questionCount > 1) {
      score += 0.1;
    }

    score += Math.min(0.3, countPhrases(lower, REASONING_KEYWORDS) * 0.1);

    if (domainCount > 1) {
      score += 0.1;
    }

    return round4(clamp01(score));
  }

  private scoreAmbiguity(prompt: string, lower: string, depth: number, domainCount: number): number {
    const words = prompt.trim().split(/\s+/).filter(word => word.length > 0);
    let score = 0;

    if (words.length < 4) {
      score += 0.4;
    } else if (words.length < 8) {
      score += 0.2;
    }

    // Pronouns are less vague when earlier turns give them a referent
    const vague = Math.min(0.3, countPhrases(lower, VAGUE_TERMS) * 0.1);
    score += depth > 0 ? vague / 2 : vague;

    const firstWord = words[0]?.toLowerCase().replace(/[^a-z]/g, '') ?? '';
    if (!lower.includes('?') && !IMPERATIVE_VERBS.includes(firstWord)) {
      score += 0.2;
    }

    if (domainCount === 0) {
      score += 0.1;
    }

    return round4(clamp01(score));
  }
}

/**
 * Normalized numeric vector over FEATURE_DIMENSIONS, each in [0, 1]
 */
export function featureVector(features: QueryFeatures): Record<FeatureDimension, number> {
  return {
    length: round4(Math.min(1, features.tokenEstimate / 4000)),
    complexity: features.complexity,
    code: features.hasCode ? round4(Math.max(0.25, Math.min(1, features.codeLines / 50))) : 0,
    tools: features.needsTools ? 1 : 0,
    depth: round4(Math.min(1, features.conversationDepth / 10)),
    ambiguity: features.ambiguity,
  };
}
