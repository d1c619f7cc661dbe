import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  ExecutorDescriptorSchema,
  PolicySchema,
  formatIssues,
  loadConfig,
  mergeWithDefaults,
  validateConfig,
} from '../config.js';

describe('RoutewiseConfigSchema defaults', () => {
  it('should fill every section', () => {
    expect(DEFAULT_CONFIG.registry).toMatchObject({
      probeIntervalMs: 5000,
      probeTimeoutMs: 2000,
      gracePeriodMs: 60000,
      executors: [],
    });
    expect(DEFAULT_CONFIG.classifier).toMatchObject({
      timeoutMs: 300,
      fallback: { domain: 'general', action: 'chat' },
    });
    expect(DEFAULT_CONFIG.classifier.url).toBeUndefined();
    expect(DEFAULT_CONFIG.policy).toMatchObject({ ttlMs: 30000, fetchTimeoutMs: 1000, policies: [] });
    expect(DEFAULT_CONFIG.scoring).toMatchObject({ costWeight: 0.1, costEpsilon: 1e-6, missingAbilityPenalty: 1 });
    expect(DEFAULT_CONFIG.features.maxContextTurns).toBe(8);
    expect(DEFAULT_CONFIG.decisionLog).toMatchObject({
      enabled: true,
      flushIntervalMs: 5000,
      flushBatchSize: 50,
      ringSize: 500,
      maxBuffered: 5000,
    });
    expect(DEFAULT_CONFIG.server).toEqual({ port: 7420, host: '127.0.0.1', corsOrigins: [], sessionCacheSize: 1000 });
  });
});

describe('ExecutorDescriptorSchema', () => {
  it('should default optional collections', () => {
    const parsed = ExecutorDescriptorSchema.parse({ id: ' local ', transport: 'static' });
    expect(parsed).toEqual({ id: 'local', transport: 'static', capabilities: [], args: [], models: [] });
  });

  it('should require an endpoint for http and rpc executors', () => {
    const http = ExecutorDescriptorSchema.safeParse({ id: 'a', transport: 'http' });
    const rpc = ExecutorDescriptorSchema.safeParse({ id: 'b', transport: 'rpc' });
    expect(http.success).toBe(false);
    expect(rpc.success).toBe(false);
    if (!http.success) {
      expect(formatIssues(http.error)).toEqual(['endpoint: http executors need an endpoint']);
    }
  });

  it('should require a command for cli executors', () => {
    const result = ExecutorDescriptorSchema.safeParse({ id: 'a', transport: 'cli' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['command: cli executors need a command']);
    }
  });

  it('should reject unknown transports with the allowed list', () => {
    const result = ExecutorDescriptorSchema.safeParse({ id: 'a', transport: 'grpc' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['transport: transport must be one of http, cli, rpc, static']);
    }
  });
});

describe('PolicySchema', () => {
  it('should default candidates and priority', () => {
    expect(PolicySchema.parse({ domain: 'math', action: 'calculation' })).toEqual({
      domain: 'math',
      action: 'calculation',
      candidates: [],
      priority: 0,
    });
  });

  it('should reject a blank domain', () => {
    expect(PolicySchema.safeParse({ domain: '  ', action: 'x' }).success).toBe(false);
  });
});

describe('validateConfig', () => {
  it('should accept partial config', () => {
    const result = validateConfig({ server: { port: 8080 } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(8080);
      expect(result.data.server.host).toBe('127.0.0.1');
    }
  });

  it('should reject out-of-range values', () => {
    expect(validateConfig({ classifier: { timeoutMs: 5 } }).success).toBe(false);
    expect(validateConfig({ scoring: { costEpsilon: 0 } }).success).toBe(false);
  });
});

describe('mergeWithDefaults', () => {
  it('should merge nested sections', () => {
    const config = mergeWithDefaults({ scoring: { costWeight: 0.5 } });
    expect(config.scoring.costWeight).toBe(0.5);
    expect(config.scoring.missingAbilityPenalty).toBe(1);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'routewise-config-'));
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a JSON file', async () => {
    const path = join(dir, 'routewise.json');
    await writeFile(path, JSON.stringify({
      policy: { policies: [{ domain: '*', action: '*', candidates: ['m1'] }] },
    }));

    const config = loadConfig(path);
    expect(config.policy.policies).toEqual([{ domain: '*', action: '*', candidates: ['m1'], priority: 0 }]);
  });

  it('should fall back to defaults when the file is missing', () => {
    expect(loadConfig(join(dir, 'absent.json'))).toEqual(DEFAULT_CONFIG);
  });

  it('should fall back to defaults on invalid config', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify({ server: { port: 'eighty' } }));
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('should fall back to defaults on malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });
});
