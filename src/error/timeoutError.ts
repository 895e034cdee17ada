import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request or token exchange outlives the client's timeout.
 * It is the abort reason of the request's signal.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  name = 'TimeoutError';
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
