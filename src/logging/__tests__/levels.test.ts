/**
 * Tests for log levels and utilities
 */

import { describe, it, expect } from 'vitest';
import {
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  formatLogLevel,
  parseLogLevel,
} from '../levels.js';

describe('LOG_LEVELS', () => {
  it('should have correct hierarchy', () => {
    expect(LOG_LEVELS.debug).toBe(0);
    expect(LOG_LEVELS.info).toBe(1);
    expect(LOG_LEVELS.warn).toBe(2);
    expect(LOG_LEVELS.error).toBe(3);
  });
});

describe('shouldLog', () => {
  it('should allow messages at or above minimum level', () => {
    expect(shouldLog('debug', 'info')).toBe(false);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('warn', 'info')).toBe(true);
    expect(shouldLog('error', 'info')).toBe(true);
  });

  it('should only pass errors at error level', () => {
    expect(shouldLog('debug', 'error')).toBe(false);
    expect(shouldLog('info', 'error')).toBe(false);
    expect(shouldLog('warn', 'error')).toBe(false);
    expect(shouldLog('error', 'error')).toBe(true);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('formatLogLevel', () => {
  it('should uppercase the level', () => {
    expect(formatLogLevel('debug')).toBe('DEBUG');
    expect(formatLogLevel('error')).toBe('ERROR');
  });
});

describe('parseLogLevel', () => {
  it('should parse case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('Debug')).toBe('debug');
  });

  it('should fall back for unknown values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('verbose', 'error')).toBe('error');
  });
});
