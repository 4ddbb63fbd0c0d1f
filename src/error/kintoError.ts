import { z } from 'zod';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Documented Kinto error body, e.g.
 * `{"errno":104,"message":"Please authenticate yourself to use this endpoint.","code":401,"error":"Unauthorized"}`.
 */
export const errorDetailSchema = z.object({
  errno: z.number().int(),
  message: z.string(),
  code: z.number().int(),
  error: z.string(),
  info: z.string().optional(),
  details: z.unknown().optional(),
});

/** Parsed Kinto error body. */
export type ErrorDetail = z.infer<typeof errorDetailSchema>;

/**
 * Error for a failure status carrying a well-formed Kinto error body.
 */
export class KintoError extends Error {
  /** KintoError error-name */
  static name = 'KintoError';
  /** HTTP status code of the response */
  readonly status: number;
  /** HTTP status text of the response */
  readonly statusText: string;
  /** Error body sent by the server */
  readonly detail: ErrorDetail;

  constructor(status: number, statusText: string, detail: ErrorDetail, opts?: ErrorOptions) {
    super(detail.message, opts);
    this.status = status;
    this.statusText = statusText;
    this.detail = detail;
  }
}

/**
 * Type guard for {@link KintoError}.
 */
export function isKintoError(error: unknown): error is KintoError {
  return isErrorType(KintoError, error);
}

/**
 * Extract a {@link KintoError} from an unknown error value, following nested causes.
 */
export function getKintoError(error: unknown): null | KintoError {
  return unwrapErrorType(KintoError, error);
}
