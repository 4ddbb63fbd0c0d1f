import { KintoError } from './kintoError.js';
import { NetworkError } from './networkError.js';
import type { ServerError } from './serverError.js';

/** Every error a Kinto request can resolve with. */
export type KintoRequestError = NetworkError | ServerError | KintoError;

/**
 * Renders a request error as a single human-readable line.
 *
 * @example
 * errorToString(new KintoError(401, 'Unauthorized', detail));
 * // 'KintoError 401 Unauthorized: Please authenticate yourself to use this endpoint. (errno 104)'
 */
export function errorToString(error: KintoRequestError): string {
  if (error instanceof NetworkError) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `NetworkError: ${error.message}${cause}`;
  }

  if (error instanceof KintoError) {
    return `KintoError ${error.status} ${error.statusText}: ${error.detail.message} (errno ${error.detail.errno})`;
  }

  return `ServerError ${error.status} ${error.statusText}: ${error.message}`;
}
