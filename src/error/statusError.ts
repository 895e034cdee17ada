import type { FailureStatus, StatusSource } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failure status reported by the API, either as the HTTP
 * status or as the `code` field of the response envelope. Both are authoritative.
 */
export class StatusError extends Error {
  /** StatusError error-name */
  static name = 'StatusError';
  name = 'StatusError';
  /** Failure status as reported */
  #status: FailureStatus;
  /** Whether the status came from the HTTP layer or the envelope */
  #source: StatusSource;
  /** Raw response body, kept for diagnostics */
  #body: string;

  constructor(message: string, status: FailureStatus, source: StatusSource, body: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
    this.#source = source;
    this.#body = body;
  }

  get status(): FailureStatus {
    return this.#status;
  }

  get source(): StatusSource {
    return this.#source;
  }

  get body(): string {
    return this.#body;
  }
}

/** Status 400: the API rejected the request parameters. */
export class BadRequestError extends StatusError {
  static name = 'BadRequestError';
  name = 'BadRequestError';
}

/** Status 401: missing or stale access token. */
export class UnauthorizedError extends StatusError {
  static name = 'UnauthorizedError';
  name = 'UnauthorizedError';
}

/** Status 403: the server blocked access. */
export class ForbiddenError extends StatusError {
  static name = 'ForbiddenError';
  name = 'ForbiddenError';
}

/** Status 495: SSL certificate error. */
export class TLSError extends StatusError {
  static name = 'TLSError';
  name = 'TLSError';
}

/** Status 504: the server reported a gateway time-out. */
export class GatewayTimeoutError extends StatusError {
  static name = 'GatewayTimeoutError';
  name = 'GatewayTimeoutError';
}

const statusErrors = {
  400: [BadRequestError, 'bad request'],
  401: [UnauthorizedError, 'unauthorized'],
  403: [ForbiddenError, 'server blocked access'],
  495: [TLSError, 'SSL certificate error'],
  504: [GatewayTimeoutError, 'gateway time-out'],
} as const satisfies Record<FailureStatus, readonly [typeof StatusError, string]>;

/** Narrows an arbitrary status or envelope code to the statuses the API treats as failures. */
export function isFailureStatus(status: unknown): status is FailureStatus {
  return typeof status === 'number' && Object.hasOwn(statusErrors, status);
}

/**
 * Maps a status to its typed error, or `null` when the status is not a failure.
 * The same table is applied to the HTTP status and to the envelope `code`.
 */
export function statusErrorFor(status: unknown, source: StatusSource, body: string): StatusError | null {
  if (!isFailureStatus(status)) {
    return null;
  }

  const [ErrorClass, reason] = statusErrors[status];
  return new ErrorClass(`error ${reason} (${source} status ${status})`, status, source, body);
}

export function isStatusError(error: unknown): error is StatusError {
  return isErrorType(StatusError, error);
}

export function getStatusError(error: unknown): null | StatusError {
  return unwrapErrorType(StatusError, error);
}

export function isUnauthorizedError(error: unknown): error is UnauthorizedError {
  return isErrorType(UnauthorizedError, error);
}

export function isForbiddenError(error: unknown): error is ForbiddenError {
  return isErrorType(ForbiddenError, error);
}

export function isBadRequestError(error: unknown): error is BadRequestError {
  return isErrorType(BadRequestError, error);
}

export function isTLSError(error: unknown): error is TLSError {
  return isErrorType(TLSError, error);
}

export function isGatewayTimeoutError(error: unknown): error is GatewayTimeoutError {
  return isErrorType(GatewayTimeoutError, error);
}
