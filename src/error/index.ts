/**
 * Error entrypoint: exports the request error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the core client.
 * @module
 */

/** Error raised when a request is aborted via AbortController, and its type guard. */
export { AbortError, isAbortError } from './abortError.js';
/** Union of request errors and a one-line renderer for them. */
export { errorToString, type KintoRequestError } from './errorToString.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error for a failure status with a documented Kinto error body, its schema, guard and extractor. */
export { type ErrorDetail, errorDetailSchema, getKintoError, isKintoError, KintoError } from './kintoError.js';
/** Error for a request without an interpretable HTTP response, its guard and extractor. */
export { getNetworkError, isNetworkError, NetworkError } from './networkError.js';
/** Error for a response body that did not have the expected shape, its guard and extractor. */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Error raised when a request exceeds the configured timeout, and its type guard. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails, its guard, extractor and issue formatter. */
export { formatIssues, getValidationError, isValidationError, ValidationError } from './validationError.js';
