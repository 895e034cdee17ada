import { isErrorType } from './isErrorType.js';

/**
 * Error representing a base URL and endpoint that do not form an absolute URL.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  name = 'ConstructURLError';
  /** What the joined URL looked like */
  #url: string;

  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** What the joined URL looked like */
  get url(): string {
    return this.#url;
  }
}

export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
