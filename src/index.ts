/**
 * Root entrypoint for the NFTScan client: re-exports the client, its types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Resolved configuration and the loader resolving overrides, environment and defaults.
 */
export { type ClientConfig, type ClientConfigInput, loadConfig } from './config/config.js';

/**
 * Constructor and runtime options accepted by {@link NftScanClient}.
 */
export type { NftScanClientOptions, NftScanClientProps } from './core/client.js';

/**
 * Client for the NFTScan REST API, with one typed method per endpoint.
 */
export { NftScanClient } from './core/client.js';

/** Endpoint table and page size cap. */
export { endpoints, MAX_PAGE_SIZE } from './core/endpoints.js';

/** Endpoint names, parameters and call options. */
export type { CallOptions, EndpointName, EndpointParams } from './core/types.js';

/**
 * Error thrown when a request is aborted via AbortController or `dispose()`.
 */
export { AbortError } from './error/abortError.js';

/**
 * Invalid method or configuration arguments, raised before any network call.
 */
export { ArgumentError } from './error/argumentError.js';

/**
 * Error representing a error constructing URL.
 */
export { ConstructURLError } from './error/constructUrlError.js';

/**
 * Export file could not be written.
 */
export { ExportError } from './error/exportError.js';

/**
 * Response body is not JSON, or lacks the fields the API promises.
 */
export { MalformedResponseError } from './error/malformedResponseError.js';

/**
 * Failure statuses reported through HTTP or the envelope `code`.
 */
export {
  BadRequestError,
  ForbiddenError,
  GatewayTimeoutError,
  StatusError,
  TLSError,
  UnauthorizedError,
} from './error/statusError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/**
 * Connection-level failure, no response was received.
 */
export { TransportError } from './error/transportError.js';

/**
 * Error thrown when validation of payloads fails.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

/** Pino log levels accepted by the client. */
export type { LogLevel } from './logger/logger.js';

/** JSON values returned by the API. */
export type { JsonObject, JsonValue } from './types/json.js';

/** Per-call options and the pipeline's success value. */
export type { Exchange, FetchClientProvider, FetchClientProviderDefinition, SendOptions } from './types/request.js';

/** Authentication state and options. */
export type { AuthenticateOptions, Credentials, Session } from './types/session.js';

/** Tuple-based result type returned by every client method. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
