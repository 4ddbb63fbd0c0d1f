import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error for an HTTP response whose body could not be read as the expected shape.
 *
 * Covers both error statuses without a documented error body and successful
 * statuses whose payload failed to decode. The message is the diagnostic,
 * which includes the raw body received.
 */
export class ServerError extends Error {
  /** ServerError error-name */
  static name = 'ServerError';
  /** HTTP status code of the response */
  readonly status: number;
  /** HTTP status text of the response */
  readonly statusText: string;

  /** Creates a new ServerError from a status line and a diagnostic */
  constructor(status: number, statusText: string, diagnostic: string, opts?: ErrorOptions) {
    super(diagnostic, opts);
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/**
 * Extract a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): null | ServerError {
  return unwrapErrorType(ServerError, error);
}
