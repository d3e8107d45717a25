/**
 * Bounded retry with exponential backoff for store and network calls.
 */

import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('retry');

export interface RetryOptions {
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Delay before the first retry in ms (default: 100) */
  initialDelayMs?: number;
  /** Upper bound on any single delay (default: 2000) */
  maxDelayMs?: number;
  /** Multiplier applied per retry (default: 2) */
  backoffFactor?: number;
  /** Only retry errors for which this returns true */
  retryOn?: (error: Error) => boolean;
}

/**
 * Delay for the n-th retry (0-based), capped at maxDelayMs.
 */
export function calculateBackoff(
  retry: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  return Math.min(initialDelayMs * Math.pow(backoffFactor, retry), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying failures that `retryOn` accepts. The last error is
 * rethrown once retries are exhausted; non-retryable errors are rethrown
 * immediately.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T> | T,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 2,
    initialDelayMs = 100,
    maxDelayMs = 2000,
    backoffFactor = 2,
    retryOn = () => true,
  } = options;

  let lastError: Error = new Error(`${operation} did not run`);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffFactor);
      log.info('Retrying', { operation, attempt, delay, maxRetries });
      await sleep(delay);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!retryOn(lastError)) {
        throw lastError;
      }

      if (attempt === maxRetries) {
        log.error('Retries exhausted', { operation, error: errorMessage(lastError) });
      } else {
        log.warn('Attempt failed', { operation, attempt, error: errorMessage(lastError) });
      }
    }
  }

  throw lastError;
}

/**
 * Errors worth retrying: connectivity, SQLite lock contention, rate limits.
 */
export function isTransientError(error: Error): boolean {
  const message = error.message.toLowerCase();

  if (
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('network')
  ) {
    return true;
  }

  if (
    message.includes('database is locked') ||
    message.includes('busy') ||
    message.includes('sqlite_busy') ||
    message.includes('disk i/o error')
  ) {
    return true;
  }

  if (message.includes('rate limit') || message.includes('too many requests')) {
    return true;
  }

  return false;
}
