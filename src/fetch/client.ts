import { isAbortError } from '../error/abortError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';
import type { FetchOptions, FetchResponse, HeaderOptions } from '../types/request.js';
import { redactUrl } from '../utils/constructUrl.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes relative paths with a configured base URL, absolute URLs pass through,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every response is returned as-is whatever its status; the API reports failures
 * both through HTTP and inside the body, and the caller interprets both.
 */
export class FetchClient {
  /** Base URL prepended to relative request paths. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `getSingleNft`) or absolute URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /**
   * Core request implementation.
   *
   * Errors:
   * - Timeouts and aborts surface as the signal's reason ({@link TimeoutError}, `AbortError`).
   * - Any other fetch rejection is wrapped in a {@link TransportError}.
   */
  async #request(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const url = this.constructPath(endpoint);
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        body: opts.body,
        method: opts.method,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      if (isTimeoutError(err) || isAbortError(err)) {
        return [err, null];
      }

      return [
        new TransportError(`error sending ${opts.method} request to ${redactUrl(url)}`, redactUrl(url), { cause: err }),
        null,
      ];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   * - Leaves absolute URLs untouched.
   */
  private constructPath(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }

    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
