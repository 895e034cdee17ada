import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { JsonValue } from './json.js';

/** Header options accepted by the fetch wrapper, `null` removes a header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null>;

/** Statuses the API uses to signal failure, both as HTTP status and as envelope `code`. */
export type FailureStatus = 400 | 401 | 403 | 495 | 504;

/** Where a status was read from. */
export type StatusSource = 'http' | 'envelope';

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Response handed back by a fetch provider. */
export type FetchResponse = Response;

/** Which failures of a first attempt re-authenticate and retry. */
export type RetryPolicy = 'any' | 'auth';

/** Per-call options shared by the pipeline and the domain methods. */
export interface SendOptions {
  /** Path the `data` payload is written to as JSON, overwriting any existing file. */
  exportFile?: string;
  /** Abort signal to cancel the call. */
  signal?: AbortSignal;
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
}

/** Successful round trip: the envelope payload plus the response it came from. */
export interface Exchange {
  data: JsonValue;
  response: FetchResponse;
}

/** Contract for HTTP client implementations used by the pipeline and session. */
export interface FetchClientProviderDefinition {
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
