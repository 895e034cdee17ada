import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when fetch itself fails (DNS, TCP, TLS handshake) and no response exists.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  name = 'TransportError';
  /** URL the request was sent to, with the query string dropped */
  #url: string;

  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** URL the request was sent to, with the query string dropped */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
