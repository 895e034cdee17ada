import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised before any network call when a method or the client
 * configuration receives invalid arguments.
 */
export class ArgumentError extends Error {
  /** ArgumentError error-name */
  static name = 'ArgumentError';
  name = 'ArgumentError';
  /** Offending arguments, one issue per rejected field */
  issues: StandardSchemaV1.Issue[];

  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const fields = issues.map(formatIssue).join(', ');
    super(fields ? `${message}: ${fields}` : message, opts);

    this.issues = issues;
  }
}

function formatIssue(issue: StandardSchemaV1.Issue): string {
  const path = (issue.path ?? [])
    .map((segment) => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');

  return path ? `${path} ${issue.message}` : issue.message;
}

/**
 * Type guard for {@link ArgumentError}.
 */
export function isArgumentError(error: unknown): error is ArgumentError {
  return isErrorType(ArgumentError, error);
}

/**
 * Extract an {@link ArgumentError} from an unknown error value, following nested causes.
 */
export function getArgumentError(error: unknown): null | ArgumentError {
  return unwrapErrorType(ArgumentError, error);
}
