import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a call is aborted through the caller's signal or `dispose()`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, also matching the `DOMException` fetch throws.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
