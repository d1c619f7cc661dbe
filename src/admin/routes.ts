/**
 * Admin API: registry and policy management, routing, decision history.
 * Every error body is `{ error: { code, message, issues? } }`.
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { formatIssues } from '../config.js';
import type { DecisionLog } from '../decision-log/index.js';
import { CancelledError, ConfigError, isRoutewiseError, type RoutewiseErrorCode } from '../errors.js';
import {
  correlationContext,
  createComponentLogger,
  extractOrGenerateCorrelationId,
  type RoutewiseLogger,
} from '../logging/index.js';
import type { PolicyStore } from '../policy/index.js';
import type { ExecutorRegistry } from '../registry/index.js';
import { RoutingSessionCache, type Router } from '../router/index.js';
import type { ScoringEngine } from '../scoring/index.js';

export interface AdminDependencies {
  registry: ExecutorRegistry;
  policies: PolicyStore;
  router: Router;
  decisions: DecisionLog;
  scoring: ScoringEngine;
  /** Sessions behind POST /decisions/:id/next; a default-sized cache when absent */
  sessions?: RoutingSessionCache;
  /** Checkpoint file reloaded by POST /checkpoint/reload */
  checkpointPath?: string;
  logger?: RoutewiseLogger;
}

type ErrorStatus = 400 | 404 | 409 | 500 | 502 | 503 | 504;

const STATUS_BY_CODE: Record<RoutewiseErrorCode, ErrorStatus> = {
  CONFIG_ERROR: 400,
  CLASSIFICATION_TIMEOUT: 504,
  CLASSIFICATION_FAILED: 502,
  POLICY_UNAVAILABLE: 503,
  NO_ELIGIBLE_CANDIDATES: 503,
  SCORING_DATA_MISSING: 500,
  CANCELLED: 504,
  DECISION_NOT_FOUND: 404,
  OUTCOME_ALREADY_RECORDED: 409,
  DUPLICATE_DECISION: 409,
  SESSION_NOT_FOUND: 404,
  PROBE_FAILED: 502,
};

// Input validation schemas
const contextTurnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});

const routeBodySchema = z.object({
  prompt: z.string().min(1, 'prompt is required'),
  context: z.array(contextTurnSchema).max(1000).optional(),
  excludedModelIds: z.array(z.string()).optional(),
  requestId: z.string().min(1).max(128).optional(),
  deadlineMs: z.number().int().positive().max(60000).optional(),
});

const nextBodySchema = z.object({
  excludedModelIds: z.array(z.string()).optional(),
}).default({});

const outcomeBodySchema = z.object({
  success: z.boolean(),
  latencyMs: z.number().min(0).optional(),
  error: z.string().max(2000).optional(),
});

const decisionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional().default(50),
});

function errorBody(code: string, message: string, issues?: string[]): {
  error: { code: string; message: string; issues?: string[] };
} {
  return { error: { code, message, ...(issues && issues.length > 0 ? { issues } : {}) } };
}

function invalidRequest(c: Context, error: z.ZodError): Response {
  const issues = formatIssues(error);
  return c.json(errorBody('INVALID_REQUEST', issues.join('; '), issues), 400);
}

/**
 * Parses the JSON body; a missing or malformed body validates as undefined
 */
function readJson(c: Context): Promise<unknown> {
  return c.req.json<unknown>().catch(() => undefined);
}

export function setupRoutes(deps: AdminDependencies): Hono {
  const app = new Hono();
  const logger = deps.logger ?? createComponentLogger('admin');
  const sessions = deps.sessions ?? new RoutingSessionCache();

  app.use('*', async (c, next) => {
    const correlationId = extractOrGenerateCorrelationId(c.req.header());
    await correlationContext.run(correlationId, next);
    c.header('x-correlation-id', correlationId);
  });

  app.onError((error, c) => {
    if (isRoutewiseError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        logger.warn('Request failed', { path: c.req.path, code: error.code, error: error.message });
      }
      const issues = error instanceof ConfigError ? error.issues : undefined;
      return c.json(errorBody(error.code, error.message, issues), status);
    }
    logger.error('Unhandled admin error', error);
    return c.json(errorBody('INTERNAL_ERROR', 'Internal server error'), 500);
  });

  /**
   * GET /health - Liveness plus a registry summary
   */
  app.get('/health', (c) => {
    const snapshot = deps.registry.snapshot();
    const executors = deps.registry.listExecutors();
    return c.json({
      status: snapshot.models.length > 0 ? 'ok' : 'degraded',
      executors: executors.length,
      liveExecutors: executors.filter(executor => executor.live).length,
      liveModels: snapshot.models.length,
      snapshotVersion: snapshot.version,
      policies: deps.policies.getStats(),
      decisions: deps.decisions.getStats(),
    });
  });

  app.get('/executors', (c) => c.json({ executors: deps.registry.listExecutors() }));

  app.post('/executors', async (c) => {
    const executor = deps.registry.register(await readJson(c));
    return c.json({ executor }, 201);
  });

  app.delete('/executors/:id', (c) => {
    const id = c.req.param('id');
    if (!deps.registry.deregister(id)) {
      return c.json(errorBody('NOT_FOUND', `Executor ${id} not found`), 404);
    }
    return c.json({ removed: id });
  });

  app.post('/executors/:id/probe', async (c) => {
    const id = c.req.param('id');
    const executor = await deps.registry.probe(id);
    if (!executor) {
      return c.json(errorBody('NOT_FOUND', `Executor ${id} not found`), 404);
    }
    return c.json({ executor });
  });

  /**
   * GET /models - Models in the current registry snapshot
   */
  app.get('/models', (c) => {
    const snapshot = deps.registry.snapshot();
    return c.json({
      version: snapshot.version,
      takenAt: new Date(snapshot.takenAt).toISOString(),
      models: snapshot.models,
    });
  });

  app.get('/policies', async (c) => {
    const policies = await deps.policies.listPolicies(c.req.raw.signal);
    return c.json({ policies });
  });

  app.put('/policies', async (c) => {
    const policy = await deps.policies.upsertPolicy(await readJson(c));
    return c.json({ policy });
  });

  app.delete('/policies/:domain/:action', async (c) => {
    const domain = c.req.param('domain');
    const action = c.req.param('action');
    if (!(await deps.policies.deletePolicy(domain, action))) {
      return c.json(errorBody('NOT_FOUND', `No policy for ${domain}/${action}`), 404);
    }
    return c.json({ removed: { domain, action } });
  });

  /**
   * POST /route - Pick a model for a prompt
   */
  app.post('/route', async (c) => {
    const parsed = routeBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return invalidRequest(c, parsed.error);
    }

    const { deadlineMs, requestId, ...request } = parsed.data;
    const session = await deps.router.routeSession(
      { ...request, requestId: requestId ?? correlationContext.getId() },
      { signal: c.req.raw.signal, ...(deadlineMs !== undefined ? { deadlineMs } : {}) }
    );
    const decision = session.decision;
    if (!decision) {
      throw new CancelledError('Routing session produced no decision');
    }
    sessions.set(decision.decisionId, session);
    return c.json(decision);
  });

  app.get('/decisions', (c) => {
    const parsed = decisionsQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!parsed.success) {
      return invalidRequest(c, parsed.error);
    }
    return c.json({ decisions: deps.decisions.recent(parsed.data.limit) });
  });

  app.get('/decisions/:id', (c) => {
    const id = c.req.param('id');
    const record = deps.decisions.get(id);
    if (!record) {
      return c.json(errorBody('DECISION_NOT_FOUND', `Decision ${id} not found`), 404);
    }
    return c.json({ decision: record });
  });

  /**
   * POST /decisions/:id/next - Next-ranked model for the same request,
   * without reclassifying. The earlier selections stay excluded.
   */
  app.post('/decisions/:id/next', async (c) => {
    const parsed = nextBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return invalidRequest(c, parsed.error);
    }
    const session = sessions.require(c.req.param('id'));
    const decision = correlationContext.run(session.requestId, () =>
      session.select(parsed.data.excludedModelIds ?? [])
    );
    sessions.set(decision.decisionId, session);
    return c.json(decision);
  });

  app.post('/decisions/:id/outcome', async (c) => {
    const parsed = outcomeBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return invalidRequest(c, parsed.error);
    }
    const record = deps.decisions.recordOutcome(c.req.param('id'), parsed.data);
    return c.json({ decision: record });
  });

  /**
   * POST /checkpoint/reload - Re-read the ability checkpoint file
   */
  app.post('/checkpoint/reload', async (c) => {
    if (!deps.checkpointPath) {
      throw new ConfigError('No checkpoint path configured', ['scoring.checkpointPath: not set']);
    }
    const checkpoint = await deps.scoring.abilities.loadFromFile(deps.checkpointPath);
    return c.json({
      version: checkpoint.version,
      dimensions: checkpoint.dimensions,
      models: Object.keys(checkpoint.abilities).length,
    });
  });

  return app;
}
