import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response body that is not JSON or lacks the fields the API promises.
 */
export class MalformedResponseError extends Error {
  /** MalformedResponseError error-name */
  static name = 'MalformedResponseError';
  name = 'MalformedResponseError';
  /** Raw body text as received */
  #body: string;

  constructor(message: string, body: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#body = body;
  }

  /** Raw body text as received */
  get body(): string {
    return this.#body;
  }
}

/**
 * Type guard for {@link MalformedResponseError}.
 */
export function isMalformedResponseError(error: unknown): error is MalformedResponseError {
  return isErrorType(MalformedResponseError, error);
}

/**
 * Extract a {@link MalformedResponseError} from an unknown error value, following nested causes.
 */
export function getMalformedResponseError(error: unknown): null | MalformedResponseError {
  return unwrapErrorType(MalformedResponseError, error);
}
