/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Turns a thrown value into an `Error`, so tuples never carry strings or plain objects.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : 'error non-error value thrown', { cause: value });
}

/**
 * Runs a promise factory and captures a rejection as the error slot.
 * @example
 * const [error, token] = await safeWrapAsync(() => credential.getToken(scopes));
 */
export async function safeWrapAsync<DataType = unknown>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Synchronous variant of {@link safeWrapAsync}.
 * @example
 * const [error, body] = safeWrap(() => JSON.stringify(payload));
 */
export function safeWrap<DataType = unknown>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}
