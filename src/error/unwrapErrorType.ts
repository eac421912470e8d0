/** Any error constructor, regardless of its constructor arguments. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches on `instanceof`, on `name`, or on a message that starts with the class name
 * (errors re-created from another error's message keep their type this way).
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error || isErrorLike(current)) {
    if (matches(errorClass, current)) {
      return current;
    }

    current = current.cause;
  }

  return null;
}

function isErrorLike(value: unknown): value is Error {
  return typeof value === 'object' && value !== null && 'name' in value && 'message' in value;
}

function matches<T extends Error>(errorClass: ErrorClass<T>, current: Error): current is T {
  return (
    current instanceof errorClass ||
    current.name === errorClass.name ||
    (Boolean(errorClass.name) && typeof current.message === 'string' && current.message.startsWith(errorClass.name))
  );
}
