/**
 * Keyword signals for feature extraction and heuristic classification.
 * Domain and action tables live in data/keywords.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const KeywordTablesSchema = z.object({
  domains: z.record(z.array(z.string().min(1))),
  actions: z.record(z.array(z.string().min(1))),
});

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

export const DEFAULT_KEYWORDS_PATH = fileURLToPath(new URL('../../data/keywords.json', import.meta.url));

let defaultTables: KeywordTables | null = null;

/**
 * Reads and validates a keyword table file
 */
export function loadKeywordTables(path: string = DEFAULT_KEYWORDS_PATH): KeywordTables {
  return KeywordTablesSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

/**
 * Bundled tables, read once
 */
export function getDefaultKeywordTables(): KeywordTables {
  if (!defaultTables) {
    defaultTables = loadKeywordTables();
  }
  return defaultTables;
}

export const TOOL_KEYWORDS = [
  'search the web',
  'look up',
  'browse',
  'latest news',
  'current weather',
  'call the api',
  'run this',
  'execute',
  'download',
  'use the tool',
];

export const REASONING_KEYWORDS = [
  'prove',
  'derive',
  'step by step',
  'trade-off',
  'architecture',
  'optimize',
  'design',
  'analyze',
  'why',
  'edge case',
];

export const VAGUE_TERMS = ['this', 'that', 'it', 'something', 'stuff', 'thing', 'things', 'etc'];

export const IMPERATIVE_VERBS = [
  'write', 'explain', 'create', 'fix', 'generate', 'summarize', 'translate', 'list',
  'implement', 'refactor', 'describe', 'compare', 'calculate', 'find', 'show', 'tell',
  'help', 'make', 'build', 'review', 'debug', 'solve', 'analyze', 'plan',
];

const CODE_LINE_PATTERN =
  /^\s*(function\b|def\b|class\b|import\b|from\s+\S+\s+import\b|const\b|let\b|var\b|return\b|public\b|private\b|#include\b|SELECT\b|if\s*\(|for\s*\(|while\s*\()|[;{}]\s*$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive phrase match
 */
export function containsPhrase(lowerText: string, phrase: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}($|[^a-z0-9])`).test(lowerText);
}

export function countPhrases(lowerText: string, phrases: readonly string[]): number {
  return phrases.filter(phrase => containsPhrase(lowerText, phrase)).length;
}

/**
 * Lines inside ``` fences plus code-looking lines outside them
 */
export function countCodeLines(text: string): number {
  let inFence = false;
  let count = 0;

  for (const line of text.split('\n')) {
    if (line.trim().startsWith('```')) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      if (line.trim().length > 0) count++;
    } else if (CODE_LINE_PATTERN.test(line)) {
      count++;
    }
  }

  return count;
}
