import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a dispatched request is aborted through the caller's `AbortSignal`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, also matching the platform `DOMException` named `AbortError`.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
