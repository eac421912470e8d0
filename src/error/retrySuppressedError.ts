import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned by the retry policy when an attempt fails with an error that must not be retried
 * (non-retryable status, cancellation, authentication failure).
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  static override name = 'RetrySuppressedError';
  /** Attempts tried before retry was suppressed */
  #attempts: number;

  /** Creates a new instance of a RetrySuppressedError with accompanying attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts tried before retry was suppressed */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes.
 */
export function getRetrySuppressedError(error: unknown): null | RetrySuppressedError {
  return unwrapErrorType(RetrySuppressedError, error);
}

/**
 * Type guard for {@link RetrySuppressedError}.
 */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}
