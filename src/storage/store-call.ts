/**
 * Store access with bounded retry.
 *
 * Store modules are synchronous and throw driver errors as-is. Retrieval code
 * goes through callStore() so that lock contention and I/O hiccups are
 * retried with backoff, and whatever still fails surfaces as a
 * StoreUnavailableError distinct from "zero matches".
 */

import { getConfig } from '../config/engine-config.js';
import { GraphRagError, StoreUnavailableError, errorMessage } from '../utils/errors.js';
import { isTransientError, withRetry } from '../utils/retry.js';

export interface StoreCallOptions {
  /** Retries after the first attempt; defaults to config.store.retries */
  retries?: number;
  /** Delay before the first retry; defaults to config.store.retryDelayMs */
  retryDelayMs?: number;
}

/**
 * Run a store operation. Engine errors raised inside `fn` pass through
 * untouched; anything else becomes StoreUnavailableError with `code`.
 */
export async function callStore<T>(
  operation: string,
  code: string,
  fn: () => T,
  options: StoreCallOptions = {},
): Promise<T> {
  const { store } = getConfig();
  try {
    return await withRetry(operation, fn, {
      maxRetries: options.retries ?? store.retries,
      initialDelayMs: options.retryDelayMs ?? store.retryDelayMs,
      retryOn: (error) => !(error instanceof GraphRagError) && isTransientError(error),
    });
  } catch (error) {
    if (error instanceof GraphRagError) throw error;
    throw new StoreUnavailableError(`${operation} failed: ${errorMessage(error)}`, code, error);
  }
}
