/**
 * Error entrypoint: typed errors returned by the client and pipeline, plus helpers
 * for identifying and unwrapping them through `cause` chains.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { AuthenticationError, getAuthenticationError, isAuthenticationError } from './authenticationError.js';
export { ConfigError, getConfigError, isConfigError } from './configError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export { getOperationError, isOperationError, OperationError } from './operationError.js';
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
