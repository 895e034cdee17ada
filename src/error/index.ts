/**
 * Error entrypoint: exports the typed errors of the client and helpers for identifying
 * and unwrapping them. Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a call is aborted via AbortController or `dispose()`. */
export { AbortError, isAbortError } from './abortError.js';
/** Invalid method or configuration arguments, raised before any network call. */
export { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';
/** Error representing a error constructing URL. */
export { ConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Export file could not be written. */
export { ExportError, isExportError } from './exportError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Response body is not JSON, or lacks the fields the API promises. */
export {
  getMalformedResponseError,
  isMalformedResponseError,
  MalformedResponseError,
} from './malformedResponseError.js';
/** Failure statuses reported by the API through HTTP or the envelope `code`. */
export {
  BadRequestError,
  ForbiddenError,
  GatewayTimeoutError,
  getStatusError,
  isBadRequestError,
  isForbiddenError,
  isGatewayTimeoutError,
  isStatusError,
  isTLSError,
  isUnauthorizedError,
  StatusError,
  statusErrorFor,
  TLSError,
  UnauthorizedError,
} from './statusError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Connection-level failure, no response was received. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Schema validation failure with its issues. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
