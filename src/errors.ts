/**
 * Error taxonomy for routing.
 *
 * Component-local failures (classifier timeout, missing ability data, stale
 * policy) are absorbed by the router into a degraded result. Pool-level
 * failures surface to the caller as one of these typed errors.
 */

export type RoutewiseErrorCode =
  | 'CONFIG_ERROR'
  | 'CLASSIFICATION_TIMEOUT'
  | 'CLASSIFICATION_FAILED'
  | 'POLICY_UNAVAILABLE'
  | 'NO_ELIGIBLE_CANDIDATES'
  | 'SCORING_DATA_MISSING'
  | 'CANCELLED'
  | 'DECISION_NOT_FOUND'
  | 'OUTCOME_ALREADY_RECORDED'
  | 'DUPLICATE_DECISION'
  | 'SESSION_NOT_FOUND'
  | 'PROBE_FAILED';

export class RoutewiseError extends Error {
  constructor(
    message: string,
    public readonly code: RoutewiseErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RoutewiseError';
  }
}

/**
 * Malformed registration or configuration. Fatal only to that registration.
 */
export class ConfigError extends RoutewiseError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ClassificationTimeoutError extends RoutewiseError {
  constructor(public readonly timeoutMs: number) {
    super(`Task classifier did not respond within ${timeoutMs}ms`, 'CLASSIFICATION_TIMEOUT');
    this.name = 'ClassificationTimeoutError';
  }
}

export class ClassificationError extends RoutewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CLASSIFICATION_FAILED', options);
    this.name = 'ClassificationError';
  }
}

export class PolicyUnavailableError extends RoutewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'POLICY_UNAVAILABLE', options);
    this.name = 'PolicyUnavailableError';
  }
}

export class NoEligibleCandidatesError extends RoutewiseError {
  constructor(
    public readonly domain: string,
    public readonly action: string,
    public readonly excluded: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(
      `No eligible candidates for ${domain}/${action}` +
        (excluded.length > 0 ? ` (excluded: ${excluded.join(', ')})` : ''),
      'NO_ELIGIBLE_CANDIDATES',
      options
    );
    this.name = 'NoEligibleCandidatesError';
  }
}

export class ScoringDataMissingError extends RoutewiseError {
  constructor(public readonly modelId: string) {
    super(`No ability vector for model ${modelId}`, 'SCORING_DATA_MISSING');
    this.name = 'ScoringDataMissingError';
  }
}

export class CancelledError extends RoutewiseError {
  constructor(message = 'Routing request was cancelled', options?: { cause?: unknown }) {
    super(message, 'CANCELLED', options);
    this.name = 'CancelledError';
  }
}

export class DecisionNotFoundError extends RoutewiseError {
  constructor(public readonly decisionId: string) {
    super(`Decision ${decisionId} not found`, 'DECISION_NOT_FOUND');
    this.name = 'DecisionNotFoundError';
  }
}

export class OutcomeAlreadyRecordedError extends RoutewiseError {
  constructor(public readonly decisionId: string) {
    super(`Outcome for decision ${decisionId} was already recorded`, 'OUTCOME_ALREADY_RECORDED');
    this.name = 'OutcomeAlreadyRecordedError';
  }
}

export class DuplicateDecisionError extends RoutewiseError {
  constructor(public readonly decisionId: string) {
    super(`Decision ${decisionId} was already recorded`, 'DUPLICATE_DECISION');
    this.name = 'DuplicateDecisionError';
  }
}

export class SessionNotFoundError extends RoutewiseError {
  constructor(public readonly decisionId: string) {
    super(`No open routing session for decision ${decisionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class ProbeError extends RoutewiseError {
  constructor(public readonly executorId: string, message: string, options?: { cause?: unknown }) {
    super(`Probe of ${executorId} failed: ${message}`, 'PROBE_FAILED', options);
    this.name = 'ProbeError';
  }
}

export function isRoutewiseError(error: unknown): error is RoutewiseError {
  return error instanceof RoutewiseError;
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs` or when `parent` aborts.
 * Distinguishes the two so callers can map timeouts and cancellation separately.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<{ ok: true; value: T } | { ok: false; reason: 'timeout' | 'cancelled'; cause?: unknown }> {
  if (parent?.aborted) {
    return { ok: false, reason: 'cancelled', cause: parent.reason };
  }

  const controller = new AbortController();
  let timedOut = false;
  let rejectAbort: ((reason: 'timeout' | 'cancelled') => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAbort = reject;
  });
  // The race below observes this rejection; keep it from surfacing as unhandled.
  aborted.catch(() => undefined);

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
    rejectAbort?.('timeout');
  }, timeoutMs);

  const onParentAbort = (): void => {
    controller.abort();
    rejectAbort?.('cancelled');
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    const value = await Promise.race([fn(controller.signal), aborted]);
    return { ok: true, value };
  } catch (error) {
    if (timedOut) {
      return { ok: false, reason: 'timeout', cause: error };
    }
    if (parent?.aborted) {
      return { ok: false, reason: 'cancelled', cause: parent.reason };
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
