/**
 * Async utilities: timeouts, delays and retries
 * @module @kubesim/shared/utils/async
 */

import { RuntimeError } from '../errors/runtime-error.js';

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a deadline.
 *
 * Rejects with `RuntimeError.timeout(operation, ms)` when the deadline passes
 * first. The underlying promise keeps running; its late outcome is ignored.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(RuntimeError.timeout(operation, ms)), ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Retry options
 */
export interface RetryOptions {
  /** Maximum attempts, including the first */
  attempts: number;
  /** Whether an error should be retried */
  shouldRetry: (error: unknown) => boolean;
  /** Delay between attempts in milliseconds */
  delayMs?: number;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or attempts run out
 */
export async function retry<T>(fn: (attempt: number) => Promise<T> | T, options: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!options.shouldRetry(error) || attempt === options.attempts) {
        throw error;
      }
      if (options.delayMs) {
        await sleep(options.delayMs);
      }
    }
  }
  throw lastError;
}

/**
 * Error message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
