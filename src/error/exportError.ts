import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a payload could not be written to its export file.
 */
export class ExportError extends Error {
  /** ExportError error-name */
  static name = 'ExportError';
  name = 'ExportError';
  /** Target path of the failed write */
  path: string;

  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.path = path;
  }
}

export function isExportError(error: unknown): error is ExportError {
  return isErrorType(ExportError, error);
}
