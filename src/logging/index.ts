/**
 * Logging - main exports
 *
 * Structured logging with correlation IDs and configurable output.
 */

import type { LogContext, RoutewiseLogger } from './logger.js';
import { createLoggerFromEnv } from './logger.js';

export {
  RoutewiseLogger,
  createLogger,
  createLoggerFromEnv,
  LoggerConfigs,
  DEFAULT_LOG_DIR,
  type LoggerConfig,
  type LogContext,
} from './logger.js';

export {
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  formatLogLevel,
  parseLogLevel,
  type LogLevel,
} from './levels.js';

export {
  generateCorrelationId,
  isValidCorrelationId,
  correlationContext,
  extractOrGenerateCorrelationId,
  withCorrelation,
} from './correlation.js';

export {
  LogFormatter,
  createLogEntry,
  type LogEntry,
  type FormatterOptions,
} from './formatter.js';

/**
 * Component-scoped logger honoring NODE_ENV presets
 */
export function createComponentLogger(
  component: string,
  context: Omit<LogContext, 'component'> = {}
): RoutewiseLogger {
  return createLoggerFromEnv({ ...context, component });
}
