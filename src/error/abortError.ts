import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is intentionally aborted through the context signal.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, including platform `DOMException`s named `AbortError`.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
