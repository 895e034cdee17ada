import type { Logger } from 'pino';
import { AbortError, isAbortError } from '../error/abortError.js';
import { isForbiddenError, isUnauthorizedError } from '../error/statusError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { SessionClient } from '../session/client.js';
import type { JsonObject } from '../types/json.js';
import type { Exchange, FetchClientProviderDefinition, RetryPolicy, SendOptions } from '../types/request.js';
import type { AuthenticateOptions, Session } from '../types/session.js';
import { exportFile } from '../utils/exportFile.js';
import { getEnvelope } from '../utils/getResponseData.js';
import { retry } from '../utils/retry.js';
import { linkSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Runtime-adjustable pipeline options. */
export interface RequestClientOptions {
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /**
   * Which first-attempt failures re-authenticate and retry.
   * @default 'any'
   */
  retryOn?: RetryPolicy;
}

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps extends RequestClientOptions {
  /** HTTP provider whose base URL already ends in the API version. */
  fetchClient: FetchClientProviderDefinition;
  session: SessionClient;
  logger: Logger;
  /**
   * Authenticate before the first attempt when the held token is already expired.
   * @default true
   */
  refreshExpiredToken?: boolean;
}

/**
 * Request pipeline of the client:
 * - posts JSON bodies with the current session headers,
 * - links the caller's signal, the client's dispose signal and the timeout,
 * - maps the HTTP status and the envelope `code` to typed errors,
 * - optionally exports the payload to a file,
 * - re-authenticates and retries a failed request once.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export class RequestClient {
  #fetchClient: FetchClientProviderDefinition;
  #session: SessionClient;
  #logger: Logger;
  #timeout: number | false;
  #retryOn: RetryPolicy;
  #refreshExpiredToken: boolean;
  /** Global abort-controller for disposing */
  #abortController = new AbortController();

  constructor({
    fetchClient,
    session,
    logger,
    timeout = 60_000,
    retryOn = 'any',
    refreshExpiredToken = true,
  }: RequestClientProps) {
    this.#fetchClient = fetchClient;
    this.#session = session;
    this.#logger = logger;
    this.#timeout = timeout;
    this.#retryOn = retryOn;
    this.#refreshExpiredToken = refreshExpiredToken;
  }

  /**
   * Updates the timeout and retry policy for subsequent requests.
   */
  config({ timeout, retryOn }: RequestClientOptions) {
    if (timeout !== undefined) {
      this.#timeout = timeout;
      this.#session.config({ timeout });
    }

    if (retryOn !== undefined) {
      this.#retryOn = retryOn;
    }
  }

  /**
   * Aborts every in-flight request and exchange of this client. Later calls fail
   * with an {@link AbortError}.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
    this.#session.dispose();
  }

  /**
   * Exchanges the credentials for a new access token. `signal` and `timeout` bound
   * this caller's wait on an exchange that may be shared with concurrent callers.
   */
  authenticate({ signal, timeout = this.#timeout }: AuthenticateOptions = {}): SafeWrapAsync<Error, Session> {
    return this.#session.authenticate({ signal, timeout });
  }

  /**
   * Sends one request to `endpoint` and unwraps the response envelope.
   *
   * @param endpoint - Endpoint name, resolved against the versioned API base URL.
   * @param body - JSON body, serialized as is.
   * @returns A promise resolving to `[error, exchange]`.
   */
  async send(endpoint: string, body: JsonObject, opts: SendOptions = {}): SafeWrapAsync<Error, Exchange> {
    const { exportFile: path, signal, timeout = this.#timeout } = opts;
    const linked = linkSignals([signal, this.#abortController.signal], timeout);

    try {
      this.#logger.debug({ endpoint }, 'sending request');
      const [errResponse, response] = await this.#fetchClient.post(endpoint, {
        body: JSON.stringify(body),
        headers: mergeHeaderOptions({ 'Content-Type': 'application/json' }, this.#session.headers()),
        ...(linked.signal && { signal: linked.signal }),
      });
      if (errResponse) {
        return [errResponse, null];
      }

      this.#logger.debug({ endpoint, status: response.status }, 'received response');
      const [errEnvelope, envelope] = await getEnvelope(response);
      if (errEnvelope) {
        return [errEnvelope, null];
      }

      if (path) {
        const [errExport] = await exportFile(path, envelope.data);
        if (errExport) {
          return [errExport, null];
        }

        this.#logger.debug({ endpoint, path }, 'exported response data');
      }

      return [null, { data: envelope.data, response }];
    } finally {
      linked.release();
    }
  }

  /**
   * Sends a request with the current token. When the first attempt fails, the
   * client authenticates once and retries once; the retry's error is returned
   * unchanged, as is a failed re-authentication.
   *
   * An expired token is refreshed before the first attempt when `refreshExpiredToken` is set.
   */
  async sendAuthenticated(endpoint: string, body: JsonObject, opts: SendOptions = {}): SafeWrapAsync<Error, Exchange> {
    const authOpts: AuthenticateOptions = { signal: opts.signal, timeout: opts.timeout ?? this.#timeout };

    if (this.#refreshExpiredToken && this.#session.isExpired()) {
      this.#logger.debug({ endpoint }, 'token expired, authenticating before sending');
      const [errAuth] = await this.authenticate(authOpts);
      if (errAuth) {
        return [errAuth, null];
      }
    }

    return retry({
      fn: () => this.send(endpoint, body, opts),
      attempts: 1,
      errFn: (err) => !this.#shouldRetry(err),
      beforeRetry: (err) => {
        this.#logger.warn({ endpoint, err }, 'request failed, re-authenticating and retrying');
        return this.authenticate(authOpts);
      },
    });
  }

  #shouldRetry(err: Error): boolean {
    if (isAbortError(err)) {
      return false;
    }

    if (this.#retryOn === 'any') {
      return true;
    }

    return isUnauthorizedError(err) || isForbiddenError(err);
  }
}
