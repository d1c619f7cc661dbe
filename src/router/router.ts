/**
 * Router: Classify → LookupPolicy → Merge → Score → Select → Log.
 *
 * Holds no per-request state; everything a request needs lives in its
 * RoutingSession.
 */

import {
  fallbackClassification,
  type Classification,
  type TaskClassifier,
} from '../classifier/index.js';
import type { DecisionLog } from '../decision-log/index.js';
import { CancelledError, PolicyUnavailableError } from '../errors.js';
import type { FeatureExtractor } from '../features/index.js';
import {
  correlationContext,
  createComponentLogger,
  generateCorrelationId,
  type RoutewiseLogger,
} from '../logging/index.js';
import type { PolicyLookup } from '../policy/index.js';
import type { RegistrySnapshot } from '../registry/index.js';
import type { ScoringEngine } from '../scoring/index.js';
import { RoutingSession } from './routing-session.js';
import type { RouteDecision, RouteOptions, RouteRequest, RouterConfig } from './types.js';

export interface RouterDependencies {
  registry: { snapshot(): RegistrySnapshot };
  classifier: TaskClassifier;
  policies: {
    getCandidates(domain: string, action: string, signal?: AbortSignal): Promise<PolicyLookup>;
  };
  scoring: ScoringEngine;
  features: FeatureExtractor;
  decisions: DecisionLog;
}

export interface RouterOptions {
  logger?: RoutewiseLogger;
  now?: () => number;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  fallback: { domain: 'general', action: 'chat' },
};

/**
 * One signal for the caller's abort and the routing deadline
 */
function linkSignal(parent: AbortSignal | undefined, deadlineMs: number | undefined): {
  signal: AbortSignal | undefined;
  dispose: () => void;
} {
  if (!parent && deadlineMs === undefined) {
    return { signal: undefined, dispose: () => undefined };
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const timer = deadlineMs === undefined
    ? undefined
    : setTimeout(() => controller.abort(new CancelledError(`Routing deadline of ${deadlineMs}ms exceeded`)), deadlineMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

function toCancelled(signal: AbortSignal | undefined, error?: unknown): CancelledError {
  if (error instanceof CancelledError) return error;
  if (signal?.reason instanceof CancelledError) return signal.reason;
  return new CancelledError(undefined, { cause: signal?.reason ?? error });
}

export class Router {
  private readonly logger: RoutewiseLogger;
  private readonly now: () => number;

  constructor(
    private readonly deps: RouterDependencies,
    private readonly config: RouterConfig = DEFAULT_ROUTER_CONFIG,
    options: RouterOptions = {}
  ) {
    this.logger = options.logger ?? createComponentLogger('Router');
    this.now = options.now ?? Date.now;
  }

  /**
   * Routes one request to the best eligible model.
   *
   * @throws NoEligibleCandidatesError when the merged pool is empty
   * @throws CancelledError when the signal or deadline fires before selection
   */
  async route(request: RouteRequest, options: RouteOptions = {}): Promise<RouteDecision> {
    const session = await this.routeSession(request, options);
    const decision = session.decision;
    if (!decision) {
      throw new CancelledError('Routing session produced no decision');
    }
    return decision;
  }

  /**
   * Like route(), but returns the session so the caller can select
   * fallbacks without reclassifying.
   */
  routeSession(request: RouteRequest, options: RouteOptions = {}): Promise<RoutingSession> {
    const requestId = request.requestId ?? generateCorrelationId();
    return correlationContext.run(requestId, () => this.open(requestId, request, options));
  }

  private async open(requestId: string, request: RouteRequest, options: RouteOptions): Promise<RoutingSession> {
    const startedAt = this.now();
    const context = request.context ?? [];
    const { signal, dispose } = linkSignal(options.signal, options.deadlineMs);

    try {
      if (signal?.aborted) {
        throw toCancelled(signal);
      }

      const features = this.deps.features.extract(request.prompt, context);
      const { classification, fallback } = await this.classify(request, signal);

      if (signal?.aborted) {
        throw toCancelled(signal);
      }

      let policy: PolicyLookup;
      let policyError: Error | undefined;
      try {
        policy = await this.deps.policies.getCandidates(classification.domain, classification.action, signal);
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) {
          throw toCancelled(signal, error);
        }
        if (!(error instanceof PolicyUnavailableError)) {
          throw error;
        }
        this.logger.error('Policy store unavailable', error);
        policy = { candidates: [], priority: 0, matched: 'none', stale: false };
        policyError = error;
      }

      if (signal?.aborted) {
        throw toCancelled(signal);
      }

      const session = new RoutingSession(
        {
          registry: this.deps.registry,
          scoring: this.deps.scoring,
          decisions: this.deps.decisions,
          logger: this.logger,
          now: this.now,
        },
        {
          requestId,
          prompt: request.prompt,
          classification,
          features,
          policy,
          ...(policyError ? { policyError } : {}),
          fallbackClassification: fallback,
          startedAt,
        }
      );
      session.select(request.excludedModelIds ?? []);
      return session;
    } catch (error) {
      if (error instanceof CancelledError) {
        this.logger.info('Routing cancelled', { reason: error.message });
      }
      throw error;
    } finally {
      dispose();
    }
  }

  /**
   * Any classifier failure other than cancellation degrades to the
   * configured fallback labels
   */
  private async classify(
    request: RouteRequest,
    signal: AbortSignal | undefined
  ): Promise<{ classification: Classification; fallback: boolean }> {
    try {
      const classification = await this.deps.classifier.classify(request.prompt, request.context ?? [], signal);
      return { classification, fallback: false };
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) {
        throw toCancelled(signal, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Classifier failed, using fallback classification', {
        classifier: this.deps.classifier.name,
        error: reason,
      });
      return { classification: fallbackClassification(this.config.fallback, reason), fallback: true };
    }
  }
}
