import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an unknown value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`, which may be sync or async.
 * - A validator that throws (sync or async) yields a `ValidationError` with the thrown error as `cause`.
 * - A result carrying `issues` yields a `ValidationError` listing them.
 * - Otherwise returns `[null, result.value]`.
 *
 * @param input - The value to validate, typically parsed JSON.
 * @param schema - The StandardSchemaV1 schema used for validation.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation returned no result', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
