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

/** Successful {@link SafeWrap}. */
export function ok<DataType>(data: DataType): [error: null, data: DataType] {
  return [null, data];
}

/** Failed {@link SafeWrap}. */
export function fail<ErrorType>(error: ErrorType): [error: ErrorType, data: null] {
  return [error, null];
}

/**
 * Turns a thrown value into an `Error`, keeping non-errors as `cause`.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }

  return new Error(`non-error value thrown: ${String(thrown)}`, { cause: thrown });
}

/**
 * Gracefully handles a given Promise factory, including factories that throw synchronously.
 * @example
 * const [error, data] = await safeWrapAsync(() => response.text());
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    return ok(await promise());
  } catch (error) {
    return fail(toError(error));
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 * @example
 * const [error, json] = safeWrap(() => JSON.parse(body));
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return ok(fn());
  } catch (error) {
    return fail(toError(error));
  }
}
