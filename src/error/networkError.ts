import type { FetchResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error for a request that produced no interpretable HTTP response: the transport
 * failed, the request was aborted or timed out, or the body could not be read.
 *
 * The transport failure is kept as `cause`.
 */
export class NetworkError extends Error {
  /** NetworkError error-name */
  static name = 'NetworkError';
  /** Response whose body could not be read, when the failure happened after the status line */
  #response: FetchResponse | null;

  /** Creates a new NetworkError, optionally keeping the response that failed mid-read */
  constructor(message: string, opts?: ErrorOptions & { response?: FetchResponse }) {
    super(message, opts);
    this.#response = opts?.response ?? null;
  }

  /** Response whose body could not be read, if any */
  get response(): FetchResponse | null {
    return this.#response;
  }
}

/**
 * Type guard for {@link NetworkError}.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return isErrorType(NetworkError, error);
}

/**
 * Extract a {@link NetworkError} from an unknown error value, following nested causes.
 */
export function getNetworkError(error: unknown): null | NetworkError {
  return unwrapErrorType(NetworkError, error);
}
