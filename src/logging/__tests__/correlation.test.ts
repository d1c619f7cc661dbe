/**
 * Tests for correlation ID management
 */

import { describe, it, expect } from 'vitest';
import {
  generateCorrelationId,
  isValidCorrelationId,
  correlationContext,
  extractOrGenerateCorrelationId,
  withCorrelation,
} from '../correlation.js';

describe('generateCorrelationId', () => {
  it('should generate 8 hex characters', () => {
    const id = generateCorrelationId();
    expect(id).toMatch(/^[a-f0-9]{8}$/);
  });

  it('should generate distinct ids', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateCorrelationId()));
    expect(ids.size).toBe(50);
  });
});

describe('isValidCorrelationId', () => {
  it('should validate format', () => {
    expect(isValidCorrelationId('a1b2c3d4')).toBe(true);
    expect(isValidCorrelationId('A1B2C3D4')).toBe(false);
    expect(isValidCorrelationId('a1b2c3')).toBe(false);
    expect(isValidCorrelationId('a1b2c3d4e5')).toBe(false);
  });
});

describe('correlationContext', () => {
  it('should have no id outside a context', () => {
    expect(correlationContext.getId()).toBeUndefined();
  });

  it('should expose the id inside run', () => {
    const seen = correlationContext.run('deadbeef', () => correlationContext.getId());
    expect(seen).toBe('deadbeef');
    expect(correlationContext.getId()).toBeUndefined();
  });

  it('should keep concurrent async contexts apart', async () => {
    const observe = (id: string, delayMs: number) =>
      correlationContext.run(id, async () => {
        await new Promise(resolve => setTimeout(resolve, delayMs));
        return correlationContext.getId();
      });

    const [first, second] = await Promise.all([observe('aaaaaaaa', 20), observe('bbbbbbbb', 5)]);
    expect(first).toBe('aaaaaaaa');
    expect(second).toBe('bbbbbbbb');
  });

  it('should return the generated id from runWithNew', () => {
    const { result, correlationId } = correlationContext.runWithNew(() => correlationContext.getId());
    expect(result).toBe(correlationId);
    expect(isValidCorrelationId(correlationId)).toBe(true);
  });
});

describe('extractOrGenerateCorrelationId', () => {
  it('should use a valid header value regardless of header case', () => {
    expect(extractOrGenerateCorrelationId({ 'X-Correlation-Id': 'abcdef12' })).toBe('abcdef12');
  });

  it('should replace an invalid header value', () => {
    const id = extractOrGenerateCorrelationId({ 'x-correlation-id': 'not valid' });
    expect(id).not.toBe('not valid');
    expect(isValidCorrelationId(id)).toBe(true);
  });

  it('should honor a custom header name', () => {
    expect(extractOrGenerateCorrelationId({ 'x-trace': '12345678' }, 'X-Trace')).toBe('12345678');
  });
});

describe('withCorrelation', () => {
  it('should reuse the caller id', async () => {
    const wrapped = withCorrelation(async () => correlationContext.getId());
    const id = await correlationContext.run('cafebabe', () => wrapped());
    expect(id).toBe('cafebabe');
  });

  it('should create an id when the caller has none', async () => {
    const wrapped = withCorrelation(async (suffix: string) => `${correlationContext.getId()}-${suffix}`);
    const value = await wrapped('x');
    expect(value).toMatch(/^[a-f0-9]{8}-x$/);
  });
});
