import { describe, test, expect } from 'vitest';
import { ScoringEngine, clampProbability, effectiveCost, sigmoid, type ScoringCandidate } from '../scoring-engine.js';
import { AbilityStore } from '../ability-store.js';
import type { DifficultyMapping } from '../difficulty.js';
import type { Classification } from '../../classifier/index.js';
import type { QueryFeatures } from '../../features/index.js';
import type { Model } from '../../registry/index.js';

const features: QueryFeatures = {
  tokenEstimate: 20,
  complexity: 0.1,
  hasCode: false,
  codeLines: 0,
  domainIndicators: [],
  needsTools: false,
  conversationDepth: 0,
  ambiguity: 0,
};

const classification: Classification = {
  domain: 'programming',
  action: 'code-generation',
  confidence: 0.7,
  reasoning: '',
  source: 'heuristic',
};

/** Every dimension is at difficulty 0, so z is the weighted ability sum */
const flat: DifficultyMapping = {
  difficulty: (_features, _classification, dimensions) => dimensions.map(() => 0),
};

function model(id: string, cost: number, executorId = 'exec-a'): Model {
  return {
    id,
    executorId,
    displayName: id,
    costPerMillionTokens: cost,
    contextWindow: 8192,
    capabilities: [],
    healthy: true,
  };
}

function candidate(id: string, cost: number, priority = 0, policyRank = 0): ScoringCandidate {
  return { model: model(id, cost), priority, policyRank };
}

function engineWith(abilities: Record<string, number[]>, weights?: number[]): ScoringEngine {
  const store = new AbilityStore({ version: 'test', dimensions: ['skill'], abilities, ...(weights && { weights }) });
  return new ScoringEngine(undefined, { abilities: store, mapping: flat });
}

describe('helpers', () => {
  test('sigmoid is centered at 0.5', () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(2)).toBeCloseTo(0.880797, 6);
  });

  test('clampProbability keeps p strictly between 0 and 1', () => {
    expect(clampProbability(0)).toBe(Number.EPSILON);
    expect(clampProbability(1)).toBe(1 - Number.EPSILON);
    expect(clampProbability(0.25)).toBe(0.25);
  });

  test('effectiveCost treats invalid costs as free', () => {
    expect(effectiveCost(3)).toBe(3);
    expect(effectiveCost(-1)).toBe(0);
    expect(effectiveCost(Number.NaN)).toBe(0);
    expect(effectiveCost(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('ScoringEngine', () => {
  test('returns nothing for no candidates', () => {
    expect(engineWith({}).score([], features, classification)).toEqual([]);
  });

  test('a free model keeps its raw probability', () => {
    const [score] = engineWith({ free: [0] }).score([candidate('free', 0)], features, classification);
    expect(score?.probability).toBe(0.5);
    expect(score?.weightedScore).toBe(0.5);
    expect(score?.explanation).toBe('programming/code-generation: p=0.5000, cost=0/M, score=0.5000, only candidate');
  });

  test('cost divides the probability', () => {
    const [score] = engineWith({ pricey: [0] }).score([candidate('pricey', 10)], features, classification);
    expect(score?.cost).toBe(10);
    expect(score?.weightedScore).toBeCloseTo(0.25, 10);
  });

  test('negative cost scores like a free model', () => {
    const [score] = engineWith({ odd: [0] }).score([candidate('odd', -5)], features, classification);
    expect(score?.cost).toBe(0);
    expect(score?.weightedScore).toBe(0.5);
  });

  test('checkpoint weights scale the ability margin', () => {
    const [score] = engineWith({ strong: [1] }, [2]).score([candidate('strong', 0)], features, classification);
    expect(score?.probability).toBeCloseTo(sigmoid(2), 12);
  });

  test('a model without ability data takes the penalty', () => {
    const [score] = engineWith({}).score([candidate('unknown', 0)], features, classification);
    expect(score?.abilityMissing).toBe(true);
    expect(score?.probability).toBeCloseTo(sigmoid(-1), 12);
    expect(score?.explanation).toContain('no ability data');
  });

  test('a cheaper model can outrank a stronger one', () => {
    const engine = engineWith({ strong: [2], cheap: [0] });
    const scores = engine.score([candidate('strong', 10), candidate('cheap', 0)], features, classification);

    expect(scores.map(s => s.modelId)).toEqual(['cheap', 'strong']);
    expect(scores[0]?.explanation).toBe(
      'programming/code-generation: p=0.5000, cost=0/M, score=0.5000, ahead of strong (0.4404)'
    );
    expect(scores[1]?.explanation).toBe(
      'programming/code-generation: p=0.8808, cost=10/M, score=0.4404, behind cheap (0.5000)'
    );
  });

  test('ties break on priority, then policy order, then model id', () => {
    const engine = engineWith({ b: [0], a: [0], c: [0], d: [0] });
    const scores = engine.score(
      [candidate('b', 1, 0, 0), candidate('c', 1, 5, 2), candidate('d', 1, 0, 1), candidate('a', 1, 0, 1)],
      features,
      classification
    );
    expect(scores.map(s => s.modelId)).toEqual(['c', 'b', 'a', 'd']);
    expect(scores.map(s => s.policyRank)).toEqual([2, 0, 1, 1]);
  });

  test('cost still separates models whose logits saturate', () => {
    const engine = engineWith({ hi: [40], lo: [-800], lo2: [-800] });
    const scores = engine.score(
      [candidate('lo', 100), candidate('hi', 0), candidate('lo2', 0)],
      features,
      classification
    );

    expect(scores.map(s => s.modelId)).toEqual(['hi', 'lo2', 'lo']);
    for (const score of scores) {
      expect(score.probability).toBeGreaterThan(0);
      expect(score.probability).toBeLessThan(1);
    }
    expect(scores[1]?.weightedScore).toBeGreaterThan(scores[2]?.weightedScore ?? 0);
  });

  test('ties on model id break on executor id', () => {
    const engine = engineWith({ m: [0] });
    const scores = engine.score(
      [
        { model: model('m', 1, 'exec-z'), priority: 0, policyRank: 0 },
        { model: model('m', 1, 'exec-b'), priority: 0, policyRank: 0 },
      ],
      features,
      classification
    );
    expect(scores.map(s => s.executorId)).toEqual(['exec-b', 'exec-z']);
  });

  test('dropping a candidate keeps the relative order of the rest', () => {
    const engine = engineWith({ a: [1.5], b: [1], c: [0.5], d: [0] });
    const pool = [candidate('a', 4), candidate('b', 1), candidate('c', 0), candidate('d', 2)];

    const full = engine.score(pool, features, classification).map(s => s.modelId);
    const top = full[0];
    const reduced = engine
      .score(pool.filter(c => c.model.id !== top), features, classification)
      .map(s => s.modelId);

    expect(reduced).toEqual(full.slice(1));
  });

  test('is deterministic for identical inputs', () => {
    const engine = engineWith({ a: [0.3], b: [0.7] });
    const pool = [candidate('a', 1), candidate('b', 3)];
    expect(engine.score(pool, features, classification)).toEqual(engine.score(pool, features, classification));
  });

  test('scores against a swapped checkpoint', () => {
    const engine = engineWith({ a: [0] });
    engine.abilities.load({ version: 2, dimensions: ['skill'], abilities: { a: [3] } });
    const [score] = engine.score([candidate('a', 0)], features, classification);
    expect(score?.probability).toBeCloseTo(sigmoid(3), 12);
    expect(engine.abilities.current().version).toBe('2');
  });
});
