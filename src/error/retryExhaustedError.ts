import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned by the retry policy once every allowed attempt has failed.
 * The last attempt's error is the `cause`.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  static override name = 'RetryExhaustedError';
  /** Attempts tried before retry was exhausted */
  #attempts: number;

  /** Creates a new instance of a RetryExhaustedError with accompanying attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts tried before retry was exhausted */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): null | RetryExhaustedError {
  return unwrapErrorType(RetryExhaustedError, error);
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}
