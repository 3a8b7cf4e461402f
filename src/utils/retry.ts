/**
 * @fileoverview Retry with exponential backoff and jitter
 *
 * @module utils/retry
 * @license MIT
 */

export interface RetryOptions {
  /** Attempts after the first one. */
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Decides whether a failure is worth another attempt. Defaults to always. */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (1-based): `base * 2^(attempt-1)`
 * capped at `maxDelayMs`, plus up to 25% random jitter.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.round(exponential + Math.random() * exponential * 0.25);
}

/**
 * Run `fn`, retrying retryable failures.
 *
 * @throws The last error once retries are exhausted, or the first
 * non-retryable one.
 *
 * @example
 * const row = await withRetry(() => store.insert(message), {
 *   retries: 3,
 *   isRetryable: isTransientDatabaseError,
 * });
 */
export async function withRetry<T>(fn: () => T | Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = options.retries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5_000;
  const isRetryable = options.isRetryable ?? (() => true);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !isRetryable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt + 1, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL']);

/**
 * Lock contention and I/O errors from better-sqlite3. Constraint
 * violations and schema errors are not transient.
 */
export function isTransientDatabaseError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const code = error.code;
  if (typeof code !== 'string') {
    return false;
  }
  return TRANSIENT_SQLITE_CODES.has(code) || code.startsWith('SQLITE_BUSY_') || code.startsWith('SQLITE_IOERR_');
}
