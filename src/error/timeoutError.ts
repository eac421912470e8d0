import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a pipeline attempt exceeds the configured per-attempt timeout.
 * The retry policy treats it as retryable.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static override name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError with the timeout that elapsed */
  constructor(timeout: number, message = `error request timed out after ${timeout}ms`, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
