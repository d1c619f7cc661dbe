/**
 * Log levels with hierarchy and filtering
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Checks if a message with the given level should be logged
 * based on the current minimum log level
 */
export function shouldLog(messageLevel: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] >= LOG_LEVELS[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Converts log level to uppercase string (for display)
 */
export function formatLogLevel(level: LogLevel): string {
  return level.toUpperCase();
}

/**
 * Parses a string to a valid log level, with fallback
 */
export function parseLogLevel(level: string, fallback: LogLevel = 'info'): LogLevel {
  const normalized = level.toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
