import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a payload rejected by a Standard Schema (zod, valibot, arktype, ...).
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new ValidationError; the issues are appended to the message so diagnostics stay readable */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${formatIssues(issues)}` : message, opts);

    this.issues = issues;
  }
}

/**
 * Renders issues as `path: message` pairs, e.g. `data.id: expected string`.
 */
export function formatIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => (typeof segment === 'object' ? String(segment.key) : String(segment)))
        .join('.');

      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
