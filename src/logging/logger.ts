/**
 * Main logging class: structured logging with correlation IDs and
 * configurable console/file output
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel } from './levels.js';
import { shouldLog } from './levels.js';
import { correlationContext } from './correlation.js';
import { LogFormatter, createLogEntry } from './formatter.js';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  format: 'json' | 'human';
  fileOutput: boolean;
  /** Directory for daily log files */
  logDir: string;
  consoleOutput: boolean;
  includeStackTrace: boolean;
  colors: boolean;
  /** Component name for all logs from this logger */
  component?: string;
}

export interface LogContext {
  correlationId?: string;
  requestId?: string;
  component?: string;
  metadata?: Record<string, unknown>;
}

export const DEFAULT_LOG_DIR = join(homedir(), '.routewise', 'logs');

export class RoutewiseLogger {
  private formatter: LogFormatter;
  private pendingWrites = new Set<Promise<void>>();
  private dirReady: Promise<void> | null = null;

  constructor(private config: LoggerConfig, private context: LogContext = {}) {
    this.formatter = new LogFormatter({
      format: config.format,
      includeStackTrace: config.includeStackTrace,
      colors: config.colors,
    });
  }

  /**
   * Creates a child logger with additional context
   */
  child(context: Partial<LogContext>): RoutewiseLogger {
    return new RoutewiseLogger(this.config, {
      ...this.context,
      ...context,
      metadata: { ...this.context.metadata, ...context.metadata },
    });
  }

  updateConfig(config: Partial<LoggerConfig>): RoutewiseLogger {
    return new RoutewiseLogger({ ...this.config, ...config }, this.context);
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown> | Error): void {
    if (metadata instanceof Error) {
      this.log('warn', message, undefined, metadata);
    } else {
      this.log('warn', message, metadata);
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log('error', message, undefined, error);
    } else {
      this.log('error', message, error);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const correlationId = this.context.correlationId ?? correlationContext.getId();
    const component = this.context.component ?? this.config.component;

    const entry = createLogEntry(level, message, {
      ...(correlationId && { correlationId }),
      ...(this.context.requestId && { requestId: this.context.requestId }),
      ...(component && { component }),
      metadata: { ...this.context.metadata, ...metadata },
      ...(error && { error }),
    });

    const formatted = this.formatter.format(entry);

    if (this.config.consoleOutput) {
      this.writeToConsole(level, formatted);
    }

    if (this.config.fileOutput) {
      this.writeToFile(formatted);
    }
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.info(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    const now = new Date();
    const filename = `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}.log`;
    const filepath = join(this.config.logDir, filename);

    const writePromise = this.ensureLogDir()
      .then(() => appendFile(filepath, message + '\n'))
      .catch((error: unknown) => {
        console.error('Failed to write log to file:', error);
      });

    this.pendingWrites.add(writePromise);
    void writePromise.finally(() => {
      this.pendingWrites.delete(writePromise);
    });
  }

  private ensureLogDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.config.logDir, { recursive: true }).then(() => undefined);
    }
    return this.dirReady;
  }

  /**
   * Waits for all pending log writes to complete
   */
  async flush(): Promise<void> {
    await Promise.all(this.pendingWrites);
  }
}

export const LoggerConfigs = {
  development: (): LoggerConfig => ({
    level: 'debug',
    format: 'human',
    fileOutput: false,
    logDir: DEFAULT_LOG_DIR,
    consoleOutput: true,
    includeStackTrace: true,
    colors: true,
    component: 'routewise',
  }),

  production: (): LoggerConfig => ({
    level: 'info',
    format: 'json',
    fileOutput: true,
    logDir: DEFAULT_LOG_DIR,
    consoleOutput: true,
    includeStackTrace: false,
    colors: false,
    component: 'routewise',
  }),

  testing: (): LoggerConfig => ({
    level: 'error',
    format: 'human',
    fileOutput: false,
    logDir: DEFAULT_LOG_DIR,
    consoleOutput: false,
    includeStackTrace: false,
    colors: false,
    component: 'routewise',
  }),

  silent: (): LoggerConfig => ({
    level: 'error',
    format: 'human',
    fileOutput: false,
    logDir: DEFAULT_LOG_DIR,
    consoleOutput: false,
    includeStackTrace: false,
    colors: false,
    component: 'routewise',
  }),
};

export function createLogger(
  config: Partial<LoggerConfig> = {},
  context: LogContext = {}
): RoutewiseLogger {
  return new RoutewiseLogger({ ...LoggerConfigs.development(), ...config }, context);
}

/**
 * Creates a logger based on NODE_ENV
 */
export function createLoggerFromEnv(
  context: LogContext = {},
  overrides: Partial<LoggerConfig> = {}
): RoutewiseLogger {
  const env = process.env.NODE_ENV || 'development';

  let baseConfig: LoggerConfig;
  switch (env) {
    case 'production':
      baseConfig = LoggerConfigs.production();
      break;
    case 'test':
      baseConfig = LoggerConfigs.testing();
      break;
    default:
      baseConfig = LoggerConfigs.development();
      break;
  }

  return new RoutewiseLogger({ ...baseConfig, ...overrides }, context);
}
