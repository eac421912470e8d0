import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned by a client operation. Wraps the serialization or pipeline failure as `cause`
 * without interpreting it, so helpers such as `getHttpError` still find the original error.
 */
export class OperationError extends Error {
  /** OperationError error-name */
  static override name = 'OperationError';
  /** Operation span name, e.g. `SecretClient.setSecret` */
  #operation: string;

  /** Creates a new instance of an OperationError tagged with the failing operation */
  constructor(message: string, operation: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#operation = operation;
  }

  /** Operation that failed */
  get operation(): string {
    return this.#operation;
  }
}

/**
 * Extract an {@link OperationError} from an unknown error value, following nested causes.
 */
export function getOperationError(error: unknown): null | OperationError {
  return unwrapErrorType(OperationError, error);
}

/**
 * Type guard for {@link OperationError}.
 */
export function isOperationError(error: unknown): error is OperationError {
  return isErrorType(OperationError, error);
}
