/**
 * Retry with exponential backoff
 */

import { HttpError } from '../errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Label used in log lines */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
  isTransient?: (error: unknown) => boolean;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retrying after the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Network failures, timeouts, 429 and 5xx are worth retrying.
 * Anything else (4xx, schema mismatches) will fail the same way again.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  if (error instanceof Error) {
    // fetch() rejects with TypeError on network failure; AbortSignal.timeout with TimeoutError
    return error.name === 'TypeError' || error.name === 'TimeoutError' || error.name === 'AbortError';
  }
  return false;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, label = 'request' } = options;
  const wait = options.sleep ?? sleep;
  const transient = options.isTransient ?? isTransientError;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!transient(error) || attempt === maxAttempts) {
        throw error;
      }
      const delay = backoffDelay(attempt, baseDelayMs);
      console.warn(`  ⚠️ [Retry] ${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`);
      await wait(delay);
    }
  }
  throw lastError;
}
