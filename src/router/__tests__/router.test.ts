import { describe, test, expect, vi, beforeEach } from 'vitest';
import { Router, type RouterDependencies } from '../router.js';
import { ExecutorRegistry } from '../../registry/executor-registry.js';
import { StaticExecutorAdapter } from '../../registry/adapters/static-adapter.js';
import type { ExecutorAdapter } from '../../registry/types.js';
import { HeuristicTaskClassifier, type TaskClassifier } from '../../classifier/index.js';
import { InMemoryPolicySource, PolicyStore } from '../../policy/index.js';
import { AbilityStore, ScoringEngine } from '../../scoring/index.js';
import { FeatureExtractor } from '../../features/index.js';
import { DecisionLog, MemoryDecisionSink } from '../../decision-log/index.js';
import {
  CancelledError,
  ClassificationTimeoutError,
  NoEligibleCandidatesError,
  PolicyUnavailableError,
} from '../../errors.js';

const PROMPT = 'Write a function that parses CSV files in TypeScript';

const unhealthy: ExecutorAdapter = {
  transport: 'http',
  healthCheck: async () => false,
  listModels: async () => [],
};

/** Rejects only when its signal aborts */
const hangingClassifier: TaskClassifier = {
  name: 'hanging',
  classify: (_prompt, _context, signal) =>
    new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')));
    }),
};

async function buildDeps(): Promise<RouterDependencies & { registry: ExecutorRegistry; sink: MemoryDecisionSink }> {
  const registry = new ExecutorRegistry(
    { probeIntervalMs: 1000, probeTimeoutMs: 50, gracePeriodMs: 60000 },
    {
      adapters: {
        static: descriptor => new StaticExecutorAdapter(descriptor),
        http: () => unhealthy,
      },
    }
  );
  registry.register({ id: 'openai', transport: 'static', models: [{ id: 'gpt-4', costPerMillionTokens: 5 }] });
  registry.register({ id: 'anthropic', transport: 'static', models: [{ id: 'claude-3', costPerMillionTokens: 3 }] });
  registry.register({ id: 'codex-host', transport: 'http', endpoint: 'http://codex.test', models: [{ id: 'codex' }] });
  await registry.probeAll();

  const policies = new PolicyStore(new InMemoryPolicySource([
    { domain: 'programming', action: 'code-generation', candidates: ['gpt-4', 'claude-3', 'codex'], priority: 1 },
    { domain: '*', action: '*', candidates: ['claude-3'], priority: 0 },
  ]));

  const abilities = new AbilityStore({
    version: 'test',
    dimensions: ['complexity'],
    abilities: { 'gpt-4': [3], 'claude-3': [0], codex: [5] },
  });

  const sink = new MemoryDecisionSink();
  return {
    registry,
    classifier: new HeuristicTaskClassifier(),
    policies,
    scoring: new ScoringEngine(undefined, { abilities }),
    features: new FeatureExtractor(),
    decisions: new DecisionLog(undefined, { sink }),
    sink,
  };
}

describe('Router', () => {
  let deps: Awaited<ReturnType<typeof buildDeps>>;

  beforeEach(async () => {
    deps = await buildDeps();
  });

  test('routes to the best live candidate', async () => {
    const router = new Router(deps);
    const decision = await router.route({ prompt: PROMPT, requestId: 'req-1' });

    expect(decision.requestId).toBe('req-1');
    expect(decision.selectedModel).toBe('gpt-4');
    expect(decision.executorId).toBe('openai');
    expect(decision.attempt).toBe(1);
    expect(decision.classification.domain).toBe('programming');
    expect(decision.classification.action).toBe('code-generation');
    expect(decision.confidence).toBe(0.7);
    expect(decision.fallbackClassification).toBe(false);
    expect(decision.policyMatch).toBe('exact');
    expect(decision.candidates.map(c => c.modelId)).toEqual(['gpt-4', 'claude-3']);
    expect(decision.reasoning.startsWith('programming/code-generation: p=')).toBe(true);
    expect(decision.reasoning.endsWith(`ahead of claude-3 (${decision.candidates[1]?.weightedScore.toFixed(4)})`)).toBe(true);
  });

  test('logs one record per decision', async () => {
    const router = new Router(deps);
    const decision = await router.route({ prompt: PROMPT });

    const record = deps.decisions.get(decision.decisionId);
    expect(record).toMatchObject({
      requestId: decision.requestId,
      attempt: 1,
      prompt: PROMPT,
      candidates: ['gpt-4', 'claude-3'],
      selectedModel: 'gpt-4',
      executorId: 'openai',
      policyMatch: 'exact',
      snapshotVersion: decision.snapshotVersion,
    });
    expect(deps.decisions.getStats().recorded).toBe(1);
  });

  test('honors caller exclusions', async () => {
    const router = new Router(deps);
    const decision = await router.route({ prompt: PROMPT, excludedModelIds: ['gpt-4'] });
    expect(decision.selectedModel).toBe('claude-3');
    expect(decision.candidates.map(c => c.modelId)).toEqual(['claude-3']);
  });

  test('falls back to the configured labels when the classifier times out', async () => {
    const failing: TaskClassifier = {
      name: 'slow',
      classify: vi.fn(async () => {
        throw new ClassificationTimeoutError(50);
      }),
    };
    const router = new Router({ ...deps, classifier: failing });

    const decision = await router.route({ prompt: PROMPT });

    expect(decision.classification).toEqual({
      domain: 'general',
      action: 'chat',
      confidence: 0,
      reasoning: 'fallback classification: Task classifier did not respond within 50ms',
      source: 'fallback',
    });
    expect(decision.fallbackClassification).toBe(true);
    expect(decision.policyMatch).toBe('default');
    expect(decision.selectedModel).toBe('claude-3');
  });

  test('uses a custom fallback classification', async () => {
    const failing: TaskClassifier = {
      name: 'broken',
      classify: async () => {
        throw new Error('boom');
      },
    };
    const router = new Router({ ...deps, classifier: failing }, { fallback: { domain: 'programming', action: 'code-generation' } });

    const decision = await router.route({ prompt: PROMPT });
    expect(decision.classification.domain).toBe('programming');
    expect(decision.selectedModel).toBe('gpt-4');
    expect(decision.fallbackClassification).toBe(true);
  });

  describe('sessions', () => {
    test('each select moves to the next-ranked model without reclassifying', async () => {
      const classify = vi.spyOn(deps.classifier, 'classify');
      const router = new Router(deps);
      const session = await router.routeSession({ prompt: PROMPT });

      expect(session.decision?.selectedModel).toBe('gpt-4');

      const second = session.select();
      expect(second.selectedModel).toBe('claude-3');
      expect(second.attempt).toBe(2);
      expect(session.excludedModels()).toEqual(['gpt-4']);

      expect(() => session.select()).toThrow(NoEligibleCandidatesError);
      expect(classify).toHaveBeenCalledTimes(1);
    });

    test('logs a failed selection with no selected model', async () => {
      const router = new Router(deps);
      const session = await router.routeSession({ prompt: PROMPT, requestId: 'req-9' });
      session.select();

      expect(() => session.select()).toThrow('No eligible candidates for programming/code-generation (excluded: gpt-4, claude-3)');

      const [latest] = deps.decisions.recent(1);
      expect(latest).toMatchObject({
        requestId: 'req-9',
        attempt: 3,
        selectedModel: null,
        executorId: null,
        candidates: [],
        excluded: ['gpt-4', 'claude-3'],
        error: 'No eligible candidates for programming/code-generation (excluded: gpt-4, claude-3)',
      });
    });

    test('re-merges against the current registry snapshot', async () => {
      const router = new Router(deps);
      const session = await router.routeSession({ prompt: PROMPT });
      deps.registry.deregister('anthropic');

      expect(() => session.select()).toThrow(NoEligibleCandidatesError);
    });
  });

  test('policy order breaks a tie between equally scored models', async () => {
    const registry = new ExecutorRegistry(
      { probeIntervalMs: 1000, probeTimeoutMs: 50, gracePeriodMs: 60000 },
      { adapters: { static: descriptor => new StaticExecutorAdapter(descriptor) } }
    );
    registry.register({
      id: 'local',
      transport: 'static',
      models: [
        { id: 'alpha', costPerMillionTokens: 2 },
        { id: 'zeta', costPerMillionTokens: 2 },
      ],
    });
    await registry.probeAll();
    const policies = new PolicyStore(new InMemoryPolicySource([
      { domain: '*', action: '*', candidates: ['zeta', 'alpha'], priority: 0 },
    ]));
    const router = new Router({ ...deps, registry, policies });

    const decision = await router.route({ prompt: PROMPT });

    expect(decision.candidates[0]?.weightedScore).toBe(decision.candidates[1]?.weightedScore);
    expect(decision.candidates.map(c => c.modelId)).toEqual(['zeta', 'alpha']);
    expect(decision.selectedModel).toBe('zeta');
  });

  test('throws NoEligibleCandidatesError when no policy candidate is live', async () => {
    deps.registry.deregister('openai');
    deps.registry.deregister('anthropic');
    const router = new Router(deps);

    await expect(router.route({ prompt: PROMPT })).rejects.toBeInstanceOf(NoEligibleCandidatesError);
    expect(deps.decisions.recent(1)[0]?.selectedModel).toBeNull();
  });

  test('an unavailable policy store ends in NoEligibleCandidatesError with the cause', async () => {
    const unavailable = new PolicyUnavailableError('Policy store unreachable and no cached policies');
    const router = new Router({
      ...deps,
      policies: {
        getCandidates: async () => {
          throw unavailable;
        },
      },
    });

    const error = await router.route({ prompt: PROMPT }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoEligibleCandidatesError);
    expect(error).toMatchObject({ cause: unavailable });
    expect(deps.decisions.recent(1)[0]).toMatchObject({ policyMatch: 'none', selectedModel: null });
  });

  describe('cancellation', () => {
    test('an aborted signal stops routing before any decision', async () => {
      const router = new Router(deps);
      const controller = new AbortController();
      controller.abort();

      await expect(router.route({ prompt: PROMPT }, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
      expect(deps.decisions.getStats().recorded).toBe(0);
    });

    test('the deadline cancels a hanging classifier', async () => {
      const router = new Router({ ...deps, classifier: hangingClassifier });

      const error = await router.route({ prompt: PROMPT }, { deadlineMs: 20 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CancelledError);
      expect(error).toMatchObject({ message: 'Routing deadline of 20ms exceeded' });
      expect(deps.decisions.getStats().recorded).toBe(0);
    });

    test('caller abort mid-classification is not treated as a classifier failure', async () => {
      const router = new Router({ ...deps, classifier: hangingClassifier });
      const controller = new AbortController();

      const pending = router.route({ prompt: PROMPT }, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });

  test('identical requests against the same state pick the same model', async () => {
    const router = new Router(deps);
    const first = await router.route({ prompt: PROMPT });
    const second = await router.route({ prompt: PROMPT });

    expect(second.selectedModel).toBe(first.selectedModel);
    expect(second.candidates).toEqual(first.candidates);
    expect(second.decisionId).not.toBe(first.decisionId);
  });
});
