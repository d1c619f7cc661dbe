/**
 * Decision log: a ring buffer of recent decisions plus a write-behind queue
 * flushed to a sink by batch size or interval.
 *
 * append() never waits on the sink. A failed flush keeps its entries (up to
 * maxBuffered, oldest dropped first) for the next flush.
 */

import { DecisionNotFoundError, DuplicateDecisionError, OutcomeAlreadyRecordedError } from '../errors.js';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import type {
  DecisionLogConfig,
  DecisionLogEntry,
  DecisionOutcomeInput,
  DecisionRecord,
  DecisionSink,
} from './types.js';

export const DEFAULT_DECISION_LOG_CONFIG: DecisionLogConfig = {
  enabled: true,
  flushIntervalMs: 5000,
  flushBatchSize: 50,
  ringSize: 500,
  maxBuffered: 5000,
};

export interface DecisionLogOptions {
  sink?: DecisionSink;
  logger?: RoutewiseLogger;
  now?: () => number;
}

export interface DecisionLogStats {
  recorded: number;
  inRing: number;
  queued: number;
  flushed: number;
  dropped: number;
  flushFailures: number;
}

function freezeRecord(record: DecisionRecord): DecisionRecord {
  return Object.freeze({
    ...record,
    candidates: Object.freeze([...record.candidates]),
    scores: Object.freeze(record.scores.map(score => Object.freeze({ ...score }))),
    excluded: Object.freeze([...record.excluded]),
    classification: Object.freeze({ ...record.classification }),
    features: Object.freeze({ ...record.features, domainIndicators: [...record.features.domainIndicators] }),
    ...(record.outcome ? { outcome: Object.freeze({ ...record.outcome }) } : {}),
  });
}

export class DecisionLog {
  /** Insertion-ordered; the first key is the oldest */
  private readonly ring = new Map<string, DecisionRecord>();
  private queue: DecisionLogEntry[] = [];
  private flushing: Promise<number> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly sink: DecisionSink | undefined;
  private readonly logger: RoutewiseLogger;
  private readonly now: () => number;
  private stats = { recorded: 0, flushed: 0, dropped: 0, flushFailures: 0 };

  constructor(
    private readonly config: DecisionLogConfig = DEFAULT_DECISION_LOG_CONFIG,
    options: DecisionLogOptions = {}
  ) {
    this.sink = config.enabled ? options.sink : undefined;
    this.logger = options.logger ?? createComponentLogger('DecisionLog');
    this.now = options.now ?? Date.now;
  }

  /**
   * Freezes and records a decision. Returns the frozen record.
   *
   * @throws DuplicateDecisionError when a record with the same id is still in the ring
   */
  append(record: DecisionRecord): DecisionRecord {
    if (this.ring.has(record.id)) {
      throw new DuplicateDecisionError(record.id);
    }
    const frozen = freezeRecord(record);

    this.ring.set(frozen.id, frozen);
    while (this.ring.size > this.config.ringSize) {
      const oldest = this.ring.keys().next();
      if (oldest.done) break;
      this.ring.delete(oldest.value);
    }
    this.stats.recorded++;

    this.enqueue({ type: 'decision', record: frozen });
    return frozen;
  }

  get(id: string): DecisionRecord | undefined {
    return this.ring.get(id);
  }

  /**
   * Most recent first
   */
  recent(limit = 50): DecisionRecord[] {
    if (limit <= 0) return [];
    return [...this.ring.values()].slice(-limit).reverse();
  }

  /**
   * Attaches the execution outcome. Decision fields are left untouched.
   *
   * @throws DecisionNotFoundError when the id is unknown or has left the ring
   * @throws OutcomeAlreadyRecordedError on a second call for the same id
   */
  recordOutcome(id: string, input: DecisionOutcomeInput): DecisionRecord {
    const record = this.ring.get(id);
    if (!record) {
      throw new DecisionNotFoundError(id);
    }
    if (record.outcome) {
      throw new OutcomeAlreadyRecordedError(id);
    }

    const outcome = Object.freeze({
      success: input.success,
      ...(input.latencyMs !== undefined ? { latencyMs: input.latencyMs } : {}),
      ...(input.error !== undefined ? { error: input.error } : {}),
      recordedAt: new Date(this.now()).toISOString(),
    });
    const updated = Object.freeze({ ...record, outcome });
    // Same key: keeps its position in the ring
    this.ring.set(id, updated);

    this.enqueue({ type: 'outcome', decisionId: id, outcome });
    return updated;
  }

  /**
   * Writes queued entries to the sink. Joins a flush already in progress.
   * Never rejects; failures are logged and the entries kept for retry.
   */
  flush(): Promise<number> {
    if (this.flushing) {
      return this.flushing;
    }
    if (!this.sink || this.queue.length === 0) {
      return Promise.resolve(0);
    }

    const sink = this.sink;
    const batch = this.queue;
    this.queue = [];

    const run = (async (): Promise<number> => {
      try {
        await sink.write(batch);
        this.stats.flushed += batch.length;
        this.logger.debug('Flushed decision log', { entries: batch.length, sink: sink.name });
        return batch.length;
      } catch (error) {
        this.stats.flushFailures++;
        this.queue = [...batch, ...this.queue];
        this.trimQueue();
        this.logger.warn('Decision log flush failed, will retry', {
          entries: batch.length,
          queued: this.queue.length,
          error: error instanceof Error ? error.message : String(error),
        });
        return 0;
      }
    })();

    const tracked = run.finally(() => {
      this.flushing = null;
    });
    this.flushing = tracked;
    return tracked;
  }

  start(): void {
    if (this.timer || !this.sink) return;
    this.timer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        this.logger.error('Scheduled flush failed', error instanceof Error ? error : { error: String(error) });
      });
    }, this.config.flushIntervalMs);
    this.timer.unref();
  }

  /**
   * Stops the flush timer and drains the queue, including entries appended
   * while an earlier flush was still running. Gives up after a failed flush.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    while (this.sink && (this.flushing || this.queue.length > 0)) {
      const failures = this.stats.flushFailures;
      await this.flush();
      if (this.stats.flushFailures > failures) {
        this.logger.warn('Decision log stopped with unflushed entries', { queued: this.queue.length });
        break;
      }
    }
  }

  getStats(): DecisionLogStats {
    return {
      ...this.stats,
      inRing: this.ring.size,
      queued: this.queue.length,
    };
  }

  private enqueue(entry: DecisionLogEntry): void {
    if (!this.sink) return;

    this.queue.push(entry);
    this.trimQueue();

    if (this.queue.length >= this.config.flushBatchSize && !this.flushing) {
      this.flush().catch((error: unknown) => {
        this.logger.error('Batch flush failed', error instanceof Error ? error : { error: String(error) });
      });
    }
  }

  private trimQueue(): void {
    const overflow = this.queue.length - this.config.maxBuffered;
    if (overflow > 0) {
      this.queue.splice(0, overflow);
      this.stats.dropped += overflow;
      this.logger.warn('Decision log buffer full, dropped oldest entries', { dropped: overflow });
    }
  }
}
