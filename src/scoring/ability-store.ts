/**
 * Per-model ability vectors from an offline-trained checkpoint.
 *
 * A checkpoint is validated as a whole and swapped by reference; scoring
 * never sees a half-loaded table.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { formatIssues } from '../config.js';
import { ConfigError, ScoringDataMissingError } from '../errors.js';
import { FEATURE_DIMENSIONS } from '../features/index.js';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';

export const AbilityCheckpointSchema = z.object({
  version: z.union([z.string().min(1), z.number()]).transform(String),
  dimensions: z.array(z.string().min(1)).min(1, 'at least one dimension is required'),
  abilities: z.record(z.array(z.number().finite())),
  /** Per-dimension discrimination; all 1 when absent */
  weights: z.array(z.number().finite().min(0)).optional(),
}).superRefine((checkpoint, ctx) => {
  const size = checkpoint.dimensions.length;
  if (new Set(checkpoint.dimensions).size !== size) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dimensions'], message: 'dimension names must be unique' });
  }
  for (const [modelId, vector] of Object.entries(checkpoint.abilities)) {
    if (vector.length !== size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['abilities', modelId],
        message: `expected ${size} values, got ${vector.length}`,
      });
    }
  }
  if (checkpoint.weights && checkpoint.weights.length !== size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['weights'],
      message: `expected ${size} values, got ${checkpoint.weights.length}`,
    });
  }
});

export interface AbilityCheckpoint {
  readonly version: string;
  readonly dimensions: readonly string[];
  readonly abilities: Readonly<Record<string, readonly number[]>>;
  readonly weights?: readonly number[];
}

/** No trained data: every model scores with the missing-ability penalty */
export const EMPTY_CHECKPOINT: AbilityCheckpoint = Object.freeze({
  version: 'empty',
  dimensions: Object.freeze([...FEATURE_DIMENSIONS]),
  abilities: Object.freeze({}),
});

export class AbilityStore {
  private checkpoint: AbilityCheckpoint = EMPTY_CHECKPOINT;
  private readonly logger: RoutewiseLogger;

  constructor(initial?: unknown, logger?: RoutewiseLogger) {
    this.logger = logger ?? createComponentLogger('AbilityStore');
    if (initial !== undefined) {
      this.load(initial);
    }
  }

  /**
   * Validates and swaps in a checkpoint.
   *
   * @throws ConfigError when the checkpoint is malformed; the current one stays in place
   */
  load(input: unknown): AbilityCheckpoint {
    const parsed = AbilityCheckpointSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid ability checkpoint: ${issues.join('; ')}`, issues);
    }

    const abilities: Record<string, readonly number[]> = {};
    for (const [modelId, vector] of Object.entries(parsed.data.abilities)) {
      abilities[modelId] = Object.freeze([...vector]);
    }

    const next: AbilityCheckpoint = Object.freeze({
      version: parsed.data.version,
      dimensions: Object.freeze([...parsed.data.dimensions]),
      abilities: Object.freeze(abilities),
      ...(parsed.data.weights ? { weights: Object.freeze([...parsed.data.weights]) } : {}),
    });

    this.checkpoint = next;
    this.logger.info('Ability checkpoint loaded', {
      version: next.version,
      dimensions: next.dimensions.length,
      models: Object.keys(abilities).length,
    });
    return next;
  }

  async loadFromFile(path: string): Promise<AbilityCheckpoint> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read ability checkpoint ${path}: ${message}`, [message]);
    }
    return this.load(raw);
  }

  current(): AbilityCheckpoint {
    return this.checkpoint;
  }

  get(modelId: string): readonly number[] | undefined {
    return Object.hasOwn(this.checkpoint.abilities, modelId) ? this.checkpoint.abilities[modelId] : undefined;
  }

  /**
   * @throws ScoringDataMissingError when the model has no ability vector
   */
  require(modelId: string): readonly number[] {
    const vector = this.get(modelId);
    if (!vector) {
      throw new ScoringDataMissingError(modelId);
    }
    return vector;
  }
}
