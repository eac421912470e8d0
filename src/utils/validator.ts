import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an unknown value against a StandardSchemaV1 schema (zod, valibot, ...) and wraps the
 * result in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throwing or rejecting validation returns a `ValidationError` with the original error as `cause`.
 * - A result with `issues` returns a `ValidationError` carrying those issues.
 * - Otherwise returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (pending instanceof Promise) {
    const [errAsync, resolved] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resolved;
  } else {
    result = pending;
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if ('issues' in result && result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
