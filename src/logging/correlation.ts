/**
 * Correlation ID management for request tracing.
 * Concurrent route() calls each run inside their own async context.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

/**
 * Generates a new correlation ID
 * Format: 8 random hex characters (e.g., "a1b2c3d4")
 */
export function generateCorrelationId(): string {
  return randomBytes(4).toString('hex');
}

export function isValidCorrelationId(id: string): boolean {
  return /^[a-f0-9]{8}$/.test(id);
}

class CorrelationContext {
  private readonly storage = new AsyncLocalStorage<string>();

  /**
   * Current correlation ID, if the caller is running inside one
   */
  getId(): string | undefined {
    return this.storage.getStore();
  }

  /**
   * Runs a function within a specific correlation context
   */
  run<T>(id: string, fn: () => T): T {
    return this.storage.run(id, fn);
  }

  runWithNew<T>(fn: () => T): { result: T; correlationId: string } {
    const id = generateCorrelationId();
    const result = this.run(id, fn);
    return { result, correlationId: id };
  }
}

export const correlationContext = new CorrelationContext();

/**
 * Extracts correlation ID from HTTP headers or generates a new one
 *
 * @param headers - HTTP request headers
 * @param headerName - Header name to look for (default: x-correlation-id)
 */
export function extractOrGenerateCorrelationId(
  headers: Record<string, string | undefined> = {},
  headerName = 'x-correlation-id'
): string {
  const normalizedHeaderName = headerName.toLowerCase();

  let headerValue: string | undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === normalizedHeaderName) {
      headerValue = value;
      break;
    }
  }

  if (headerValue && isValidCorrelationId(headerValue)) {
    return headerValue;
  }

  return generateCorrelationId();
}

/**
 * Wraps an async function so it runs under the caller's correlation ID,
 * or a fresh one when the caller has none.
 */
export function withCorrelation<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>
): (...args: T) => Promise<R> {
  return async (...args: T): Promise<R> => {
    const correlationId = correlationContext.getId() ?? generateCorrelationId();
    return correlationContext.run(correlationId, () => fn(...args));
  };
}
