import type { Logger } from 'pino';
import { z } from 'zod';
import { AbortError } from '../error/abortError.js';
import { isMalformedResponseError, MalformedResponseError } from '../error/malformedResponseError.js';
import type { FetchClientProviderDefinition } from '../types/request.js';
import type { AuthenticateOptions, Credentials, Session } from '../types/session.js';
import { constructUrl, redactUrl } from '../utils/constructUrl.js';
import { getResponseBody, parseEnvelope } from '../utils/getResponseData.js';
import { linkSignals, raceSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const tokenSchema = z.object({
  accessToken: z.string().min(1),
  expiration: z.number().nonnegative(),
});

/** Configuration for constructing a {@link SessionClient}. */
export interface SessionClientProps {
  /** HTTP provider shared with the request pipeline. */
  fetchClient: FetchClientProviderDefinition;
  credentials: Credentials;
  /** Absolute URL of the token exchange. */
  authUrl: string;
  logger: Logger;
  /**
   * Timeout of the token exchange in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
}

/**
 * Holds the credentials and the access token of one client, and performs the
 * token exchange.
 *
 * - The exchange is a `POST` without body, carrying `apiKey` and `apiSecret` as
 *   query parameters and no `Access-Token`.
 * - The token response is accepted bare (`{ accessToken, expiration }`) or wrapped
 *   in the API envelope, in which case the envelope `code` is mapped like any other response.
 * - Concurrent calls to {@link SessionClient.authenticate} share one exchange, which runs
 *   under the session's own timeout and dispose signal. A caller's signal or timeout
 *   only ends that caller's wait.
 */
export class SessionClient {
  #fetchClient: FetchClientProviderDefinition;
  #credentials: Credentials;
  #authUrl: string;
  #logger: Logger;
  #token: string | null = null;
  #expiresAt: number | null = null;
  /** In-flight exchange, shared by concurrent callers */
  #pending: SafeWrapAsync<Error, Session> | null = null;
  #timeout: number | false;
  /** Aborts the exchange in flight and every later one */
  #abortController = new AbortController();

  constructor({ fetchClient, credentials, authUrl, logger, timeout = 60_000 }: SessionClientProps) {
    this.#fetchClient = fetchClient;
    this.#credentials = credentials;
    this.#authUrl = authUrl;
    this.#logger = logger;
    this.#timeout = timeout;
  }

  /**
   * Updates the timeout of later exchanges.
   */
  config({ timeout }: { timeout?: number | false }) {
    if (timeout !== undefined) {
      this.#timeout = timeout;
    }
  }

  /**
   * Aborts the exchange in flight. Later exchanges fail with an `AbortError`.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
  }

  get token(): string | null {
    return this.#token;
  }

  /** Token expiry as epoch milliseconds. */
  get expiresAt(): number | null {
    return this.#expiresAt;
  }

  /** Snapshot of the current token and expiry. */
  get session(): Session {
    return { token: this.#token, expiresAt: this.#expiresAt };
  }

  /**
   * Whether a token is held and its expiry has passed.
   * Without a token there is nothing to expire.
   */
  isExpired(now = Date.now()): boolean {
    return this.#token !== null && this.#expiresAt !== null && now >= this.#expiresAt;
  }

  /**
   * Headers authenticating a domain request, empty until a token is held.
   */
  headers(): Record<string, string> {
    return this.#token ? { 'Access-Token': this.#token } : {};
  }

  /** Forgets the held token. */
  clear() {
    this.#token = null;
    this.#expiresAt = null;
  }

  /**
   * Exchanges the credentials for a new access token and stores it.
   *
   * While an exchange is in flight, further calls wait for it instead of starting
   * another one. `signal` and `timeout` bound how long this caller waits; when either
   * fires, the call returns its reason and the exchange goes on for the others.
   *
   * @returns A promise resolving to `[error, session]`.
   */
  authenticate({ signal, timeout }: AuthenticateOptions = {}): SafeWrapAsync<Error, Session> {
    if (!this.#pending) {
      this.#pending = this.#exchange().finally(() => {
        this.#pending = null;
      });
    }

    return raceSignals(this.#pending, [signal], timeout);
  }

  async #exchange(): SafeWrapAsync<Error, Session> {
    const [errUrl, url] = constructUrl(this.#authUrl, [], {
      apiKey: this.#credentials.apiKey,
      apiSecret: this.#credentials.apiSecret,
    });
    if (errUrl) {
      return [errUrl, null];
    }

    this.#logger.debug({ url: redactUrl(url) }, 'authenticating');

    const linked = linkSignals([this.#abortController.signal], this.#timeout);
    const [errResponse, response] = await this.#fetchClient
      .post(url, { ...(linked.signal && { signal: linked.signal }) })
      .finally(linked.release);
    if (errResponse) {
      return [errResponse, null];
    }

    const [errBody, body] = await getResponseBody(response);
    if (errBody) {
      return [errBody, null];
    }

    let payload: unknown = body.json;
    const [errEnvelope, envelope] = await parseEnvelope(body);
    if (!errEnvelope) {
      payload = envelope.data;
    } else if (!isMalformedResponseError(errEnvelope)) {
      return [errEnvelope, null];
    }

    const [errToken, token] = await validator(payload, tokenSchema);
    if (errToken) {
      return [
        new MalformedResponseError('error token response is missing accessToken or expiration', body.text, {
          cause: errToken,
        }),
        null,
      ];
    }

    this.#token = token.accessToken;
    this.#expiresAt = Date.now() + token.expiration * 1000;
    this.#logger.info({ expiresAt: new Date(this.#expiresAt).toISOString() }, 'authenticated');

    return [null, this.session];
  }
}
