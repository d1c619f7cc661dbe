/**
 * Structured log formatting for different environments
 */

import type { LogLevel } from './levels.js';
import { formatLogLevel } from './levels.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  requestId?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface FormatterOptions {
  /** Use JSON format (for production) or human-readable (for development) */
  format: 'json' | 'human';
  includeStackTrace: boolean;
  timezone?: string;
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';

export class LogFormatter {
  constructor(private options: FormatterOptions) {}

  format(entry: LogEntry): string {
    return this.options.format === 'json'
      ? this.formatJson(entry)
      : this.formatHuman(entry);
  }

  private formatJson(entry: LogEntry): string {
    const jsonEntry = {
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.correlationId && { correlationId: entry.correlationId }),
      ...(entry.requestId && { requestId: entry.requestId }),
      ...(entry.component && { component: entry.component }),
      ...(entry.metadata && Object.keys(entry.metadata).length > 0 && { metadata: entry.metadata }),
      ...(entry.error && {
        error: this.options.includeStackTrace
          ? entry.error
          : { name: entry.error.name, message: entry.error.message, ...(entry.error.code && { code: entry.error.code }) },
      }),
    };

    return JSON.stringify(jsonEntry);
  }

  /**
   * [time] LEVEL [correlation] [component] message (request=…) | k=v …
   */
  private formatHuman(entry: LogEntry): string {
    const level = formatLogLevel(entry.level);
    const parts = [
      `[${this.formatTimestamp(entry.timestamp)}]`,
      this.options.colors ? `${LEVEL_COLORS[entry.level]}${level}${RESET}` : level,
    ];

    if (entry.correlationId) {
      parts.push(`[${entry.correlationId}]`);
    }
    if (entry.component) {
      parts.push(`[${entry.component}]`);
    }
    parts.push(entry.message);

    let result = parts.join(' ');

    if (entry.requestId) {
      result += ` (request=${entry.requestId})`;
    }

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metadataStr = Object.entries(entry.metadata)
        .map(([key, value]) => `${key}=${this.formatValue(value)}`)
        .join(' ');
      result += ` | ${metadataStr}`;
    }

    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : '';
      result += `\n  Error: ${entry.error.name}${code}: ${entry.error.message}`;
      if (this.options.includeStackTrace && entry.error.stack) {
        result += `\n${entry.error.stack.split('\n').map(line => `    ${line}`).join('\n')}`;
      }
    }

    return result;
  }

  private formatTimestamp(timestamp: string): string {
    return new Date(timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      timeZone: this.options.timezone,
    });
  }

  private formatValue(value: unknown): string {
    if (value === null || value === undefined) {
      return String(value);
    }
    if (typeof value === 'string') {
      return value.includes(' ') ? `"${value}"` : value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    if (Array.isArray(value)) {
      return `[${value.map(v => this.formatValue(v)).join(',')}]`;
    }
    return JSON.stringify(value);
  }
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  options: {
    correlationId?: string;
    requestId?: string;
    component?: string;
    metadata?: Record<string, unknown>;
    error?: Error;
  } = {}
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (options.correlationId) entry.correlationId = options.correlationId;
  if (options.requestId) entry.requestId = options.requestId;
  if (options.component) entry.component = options.component;
  if (options.metadata) entry.metadata = options.metadata;

  if (options.error) {
    const code = errorCode(options.error);
    entry.error = {
      name: options.error.name,
      message: options.error.message,
      ...(code && { code }),
      ...(options.error.stack && { stack: options.error.stack }),
    };
  }

  return entry;
}
