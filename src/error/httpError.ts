import type { FetchResponse, StatusCode } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a service response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static override name = 'HTTPError';
  /** Response causing the HTTPError */
  #response: FetchResponse;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: FetchResponse, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Status code of the failed response */
  get status(): StatusCode {
    return this.#response.status;
  }

  /**
   * Response causing the HTTPError. Cloned when possible so the body can be read more than once.
   */
  get response(): FetchResponse {
    if (typeof this.#response.clone !== 'function') {
      return this.#response;
    }

    // clone() is typed as plain Response; the status is unchanged
    return this.#response.clone() as FetchResponse;
  }
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}
