import { setTimeout as delay } from 'timers/promises';
import { RETRY_CONSTANTS } from '../config/constants.js';
import { getErrorMessage } from './error-utils.js';
import { log } from './logger.js';

export interface RetryOptions {
  /** Maximum number of attempts, the first one included */
  maxAttempts?: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  /** Used in log messages */
  label?: string;
  /** Stops retrying (the pending delay rejects with an AbortError) */
  signal?: AbortSignal;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const baseDelayMs = options.baseDelayMs ?? RETRY_CONSTANTS.BASE_DELAY_MS;
  const backoffFactor = options.backoffFactor ?? RETRY_CONSTANTS.BACKOFF_FACTOR;
  const maxDelayMs = options.maxDelayMs ?? RETRY_CONSTANTS.MAX_DELAY_MS;
  return Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
}

/**
 * Execute an async function with bounded exponential backoff.
 * Never throws for a failing `fn`; the last error comes back in the result.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_CONSTANTS.MAX_ATTEMPTS);
  const label = options.label ?? 'operation';
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await fn(attempt);
      if (attempt > 1) {
        log.debug(`${label} succeeded on attempt ${attempt}/${maxAttempts}`);
      }
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts) {
        log.warn(`${label} exhausted ${maxAttempts} attempts`, { error: getErrorMessage(error) });
        break;
      }

      const wait = backoffDelay(attempt, options);
      log.debug(`${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${wait}ms`, {
        error: getErrorMessage(error)
      });
      await delay(wait, undefined, { signal: options.signal });
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
