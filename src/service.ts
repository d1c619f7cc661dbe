/**
 * Composition root: builds the routing pipeline from a RoutewiseConfig and
 * owns the background timers and the admin server.
 */

import { AdminServer } from './admin/index.js';
import {
  HeuristicTaskClassifier,
  HttpTaskClassifier,
  type TaskClassifier,
} from './classifier/index.js';
import type { RoutewiseConfig } from './config.js';
import { DecisionLog, JsonlDecisionSink, type DecisionSink } from './decision-log/index.js';
import { isRoutewiseError } from './errors.js';
import { FeatureExtractor } from './features/index.js';
import { createLogger, type RoutewiseLogger } from './logging/index.js';
import {
  HttpPolicySource,
  InMemoryPolicySource,
  PolicyStore,
  type PolicySource,
} from './policy/index.js';
import {
  createDefaultAdapterFactories,
  ExecutorRegistry,
  type AdapterFactories,
} from './registry/index.js';
import { Router, RoutingSessionCache } from './router/index.js';
import { AbilityStore, ScoringEngine } from './scoring/index.js';

/**
 * Replacements for the collaborators the config would otherwise build
 */
export interface ServiceOverrides {
  adapters?: AdapterFactories;
  classifier?: TaskClassifier;
  policySource?: PolicySource;
  decisionSink?: DecisionSink;
  logger?: RoutewiseLogger;
  now?: () => number;
}

export interface StartOptions {
  /** Listen on config.server; off for embedding as a library */
  serve?: boolean;
}

export class RoutewiseService {
  readonly registry: ExecutorRegistry;
  readonly policies: PolicyStore;
  readonly scoring: ScoringEngine;
  readonly decisions: DecisionLog;
  readonly router: Router;
  readonly logger: RoutewiseLogger;
  private admin: AdminServer | null = null;
  private started = false;

  constructor(private readonly config: RoutewiseConfig, overrides: ServiceOverrides = {}) {
    this.logger = overrides.logger ?? createLogger({ ...config.logging, component: 'routewise' });
    const now = overrides.now ?? Date.now;
    const child = (component: string): RoutewiseLogger => this.logger.child({ component });

    this.registry = new ExecutorRegistry(config.registry, {
      adapters: overrides.adapters ?? createDefaultAdapterFactories(),
      logger: child('ExecutorRegistry'),
      now,
    });
    for (const descriptor of config.registry.executors) {
      try {
        this.registry.register(descriptor);
      } catch (error) {
        if (!isRoutewiseError(error)) throw error;
        this.logger.error('Skipping executor from config', error);
      }
    }

    const classifier = overrides.classifier ?? (config.classifier.url
      ? new HttpTaskClassifier({
          url: config.classifier.url,
          timeoutMs: config.classifier.timeoutMs,
          ...(config.classifier.apiKey ? { apiKey: config.classifier.apiKey } : {}),
        })
      : new HeuristicTaskClassifier(config.classifier.fallback));

    const source = overrides.policySource ?? (config.policy.url
      ? new HttpPolicySource({ url: config.policy.url })
      : new InMemoryPolicySource(config.policy.policies));
    this.policies = new PolicyStore(
      source,
      { ttlMs: config.policy.ttlMs, fetchTimeoutMs: config.policy.fetchTimeoutMs },
      { logger: child('PolicyStore'), now }
    );

    this.scoring = new ScoringEngine(
      {
        costWeight: config.scoring.costWeight,
        costEpsilon: config.scoring.costEpsilon,
        missingAbilityPenalty: config.scoring.missingAbilityPenalty,
      },
      { abilities: new AbilityStore(undefined, child('AbilityStore')), logger: child('ScoringEngine') }
    );

    const { dataDir, ...decisionConfig } = config.decisionLog;
    this.decisions = new DecisionLog(decisionConfig, {
      sink: overrides.decisionSink ?? new JsonlDecisionSink(dataDir),
      logger: child('DecisionLog'),
      now,
    });

    this.router = new Router(
      {
        registry: this.registry,
        classifier,
        policies: this.policies,
        scoring: this.scoring,
        features: new FeatureExtractor(config.features),
        decisions: this.decisions,
      },
      { fallback: config.classifier.fallback },
      { logger: child('Router'), now }
    );
  }

  /**
   * Loads the checkpoint, runs a first probe round, then starts the
   * background timers (and the admin server when asked).
   */
  async start(options: StartOptions = {}): Promise<void> {
    if (this.started) return;
    this.started = true;

    if (this.config.scoring.checkpointPath) {
      try {
        await this.scoring.abilities.loadFromFile(this.config.scoring.checkpointPath);
      } catch (error) {
        if (!isRoutewiseError(error)) throw error;
        this.logger.error('Ability checkpoint not loaded; scoring without ability data', error);
      }
    }

    await this.registry.probeAll();
    this.registry.start();
    this.decisions.start();

    if (options.serve) {
      this.admin = new AdminServer(
        {
          registry: this.registry,
          policies: this.policies,
          router: this.router,
          decisions: this.decisions,
          scoring: this.scoring,
          sessions: new RoutingSessionCache(this.config.server.sessionCacheSize),
          ...(this.config.scoring.checkpointPath ? { checkpointPath: this.config.scoring.checkpointPath } : {}),
          logger: this.logger.child({ component: 'admin' }),
        },
        this.config.server
      );
      await this.admin.start();
    }

    const snapshot = this.registry.snapshot();
    this.logger.info('Routewise started', {
      executors: this.registry.listExecutors().length,
      liveModels: snapshot.models.length,
    });
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    this.registry.stop();
    if (this.admin) {
      await this.admin.stop();
      this.admin = null;
    }
    await this.decisions.stop();
    this.logger.info('Routewise stopped');
    await this.logger.flush();
  }
}
