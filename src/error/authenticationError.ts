import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised by the bearer-token policy when the credential throws or yields no token.
 */
export class AuthenticationError extends Error {
  /** AuthenticationError error-name */
  static override name = 'AuthenticationError';
}

/**
 * Extract an {@link AuthenticationError} from an unknown error value, following nested causes.
 */
export function getAuthenticationError(error: unknown): null | AuthenticationError {
  return unwrapErrorType(AuthenticationError, error);
}

/**
 * Type guard for {@link AuthenticationError}.
 */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return isErrorType(AuthenticationError, error);
}
