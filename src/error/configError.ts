import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised while building a client: the endpoint could not be parsed,
 * uses an unsupported protocol, or the environment configuration is invalid.
 * A client is never created when this error is returned.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  static override name = 'ConfigError';
  /** Endpoint input as it was given */
  #url: string;

  /** Creates a new instance of a ConfigError with the offending endpoint input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** Endpoint input that failed to configure */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link ConfigError} from an unknown error value, following nested causes.
 */
export function getConfigError(error: unknown): null | ConfigError {
  return unwrapErrorType(ConfigError, error);
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}
