import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryLoopOptions<R> {
  /** Function to execute with the 1-based attempt number; must return a tuple-style result. */
  fn: (attempt: number) => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   * @default 2
   */
  attempts?: number;
  /**
   * Milliseconds to wait between attempts.
   * @default 1000
   */
  timeout?: number;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Cuts the wait between attempts short; the next attempt is expected to observe the abort itself. */
  signal?: AbortSignal;
  /** Called before waiting for the next attempt. */
  onRetry?: (e: Error, attempt: number) => void;
}

/**
 * Keeps calling a tuple-returning function until it succeeds, `errFn` suppresses
 * further attempts, or the attempt budget runs out. Waits a fixed `timeout` between attempts.
 *
 * The last error is always the `cause` of the returned {@link RetrySuppressedError}
 * or {@link RetryExhaustedError}.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 2,
  timeout = 1000,
  errFn,
  signal,
  onRetry,
}: RetryLoopOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn(attempt);
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
    }

    onRetry?.(err, attempt);
    await sleep(timeout, signal);
  }
}
