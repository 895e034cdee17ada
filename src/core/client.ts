import type { Logger } from 'pino';
import { type ClientConfigInput, loadConfig } from '../config/config.js';
import { ArgumentError } from '../error/argumentError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { createLogger, createRootLogger } from '../logger/logger.js';
import { RequestClient, type RequestClientOptions } from '../request/client.js';
import { SessionClient } from '../session/client.js';
import type { JsonValue } from '../types/json.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchResponse,
  HeaderOptions,
  SendOptions,
} from '../types/request.js';
import type { AuthenticateOptions, Session } from '../types/session.js';
import { constructUrl } from '../utils/constructUrl.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { endpoints, toWireBody } from './endpoints.js';
import type { CallOptions, EndpointDefinition, EndpointName, EndpointParams } from './types.js';

/** Options adjustable on a live client through {@link NftScanClient.config}. */
export interface NftScanClientOptions extends RequestClientOptions {
  /** Headers merged into the defaults sent with every request; `null` removes one. */
  headers?: HeaderOptions;
}

/** Configuration for constructing a {@link NftScanClient}, extends {@link ClientConfigInput}. */
export interface NftScanClientProps extends ClientConfigInput {
  /** Extra default headers sent with every request. */
  headers?: HeaderOptions;
  /** pino logger replacing the client's own; `logLevel` is ignored when set. */
  logger?: Logger;
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /**
   * Environment the configuration falls back to.
   * @default process.env
   */
  env?: NodeJS.ProcessEnv;
}

/**
 * Client for the NFTScan REST API.
 *
 * - validates method arguments before anything is sent,
 * - authenticates lazily: the first request goes out without a token, and any failed
 *   first attempt is retried once after a fresh token exchange,
 * - returns the envelope `data` of every response, or the response itself with `raw`.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}; only the
 * constructor throws, with an {@link ArgumentError} for invalid configuration.
 *
 * @example
 * const client = new NftScanClient({ apiKey: 'test-key', apiSecret: 'test-secret' });
 * const [err, nft] = await client.getSingleNft({ nftAddress: '0xabc', tokenId: '1' });
 */
export class NftScanClient {
  #logger: Logger;
  #fetchClient: FetchClientProviderDefinition;
  #session: SessionClient;
  #requestClient: RequestClient;

  constructor({ headers, logger, fetchProvider = FetchClient, env, ...overrides }: NftScanClientProps) {
    const [errConfig, config] = loadConfig(overrides, env);
    if (errConfig) {
      throw errConfig;
    }

    const [errUrl, apiUrl] = constructUrl(config.baseUrl, [config.version]);
    if (errUrl) {
      throw new ArgumentError('error invalid client configuration', [{ message: errUrl.message, path: ['baseUrl'] }], {
        cause: errUrl,
      });
    }

    this.#logger = logger ?? createRootLogger(config.logLevel);
    this.#fetchClient = new fetchProvider(apiUrl, {
      headers: mergeHeaderOptions({ Accept: 'application/json' }, headers),
    });
    this.#session = new SessionClient({
      fetchClient: this.#fetchClient,
      credentials: { apiKey: config.apiKey, apiSecret: config.apiSecret },
      authUrl: config.authUrl,
      logger: createLogger(this.#logger, 'session'),
      timeout: config.timeout,
    });
    this.#requestClient = new RequestClient({
      fetchClient: this.#fetchClient,
      session: this.#session,
      logger: createLogger(this.#logger, 'request'),
      timeout: config.timeout,
      retryOn: config.retryOn,
      refreshExpiredToken: config.refreshExpiredToken,
    });

    this.#logger.debug({ apiUrl, timeout: config.timeout, retryOn: config.retryOn }, 'client created');
  }

  /** Current token and expiry. */
  get session(): Session {
    return this.#session.session;
  }

  /**
   * Updates timeout, retry policy and default headers for subsequent requests.
   */
  config({ headers, timeout, retryOn }: NftScanClientOptions) {
    this.#requestClient.config({ timeout, retryOn });
    if (headers) {
      this.#fetchClient.config({ headers });
    }
  }

  /**
   * Aborts every in-flight request. Requests made afterwards fail with an `AbortError`.
   */
  dispose() {
    this.#logger.debug('client disposed');
    this.#requestClient.dispose();
  }

  /**
   * Exchanges the credentials for a new access token ahead of the first request.
   */
  authenticate(opts?: AuthenticateOptions): SafeWrapAsync<Error, Session> {
    return this.#requestClient.authenticate(opts);
  }

  /**
   * Calls an API method by name.
   *
   * - Validates `params` against the endpoint's schema, applying defaults and the page size cap.
   * - Sends the snake_case body plus the endpoint's fixed fields.
   * - Re-authenticates and retries once when the first attempt fails.
   *
   * @param endpoint - API method name.
   * @param params - camelCase method parameters.
   * @returns A promise resolving to `[error, data]`, or `[error, response]` with `raw: true`.
   */
  call<Endpoint extends EndpointName>(
    endpoint: Endpoint,
    params: EndpointParams<Endpoint>,
    opts: CallOptions & { raw: true },
  ): SafeWrapAsync<Error, FetchResponse>;
  call<Endpoint extends EndpointName>(
    endpoint: Endpoint,
    params: EndpointParams<Endpoint>,
    opts?: CallOptions & { raw?: false },
  ): SafeWrapAsync<Error, JsonValue>;
  async call<Endpoint extends EndpointName>(
    endpoint: Endpoint,
    params: EndpointParams<Endpoint>,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, JsonValue | FetchResponse> {
    const { raw = false, ...sendOpts } = opts;
    const definition: EndpointDefinition = endpoints[endpoint];

    const [errParams, parsed] = await validator(params, definition.params);
    if (errParams) {
      return [
        new ArgumentError(`error invalid arguments for ${endpoint}`, errParams.issues, { cause: errParams }),
        null,
      ];
    }

    const [err, exchange] = await this.#requestClient.sendAuthenticated(
      endpoint,
      toWireBody(parsed, definition.fixed),
      sendOpts,
    );
    if (err) {
      return [err, null];
    }

    return [null, raw ? exchange.response : exchange.data];
  }

  /** All NFTs of a wallet for one protocol. */
  getAllNftByUserAddress(
    params: EndpointParams<'getAllNftByUserAddress'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getAllNftByUserAddress', params, opts);
  }

  /** NFTs of a wallet grouped by contract. */
  getGroupByNftContract(params: EndpointParams<'getGroupByNftContract'>, opts?: SendOptions): SafeWrapAsync<Error, JsonValue> {
    return this.call('getGroupByNftContract', params, opts);
  }

  /** NFTs minted by a wallet. */
  getMintByUserAddress(params: EndpointParams<'getMintByUserAddress'>, opts?: SendOptions): SafeWrapAsync<Error, JsonValue> {
    return this.call('getMintByUserAddress', params, opts);
  }

  /** NFTs minted by a wallet on one contract. */
  getMintByUserAddressAndNftAddress(
    params: EndpointParams<'getMintByUserAddressAndNftAddress'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getMintByUserAddressAndNftAddress', params, opts);
  }

  /** Transaction records of a contract. */
  getNFTRecordByContract(
    params: EndpointParams<'getNFTRecordByContract'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getNFTRecordByContract', params, opts);
  }

  /** NFTs a wallet holds on one contract. */
  getNftByContractAndUserAddress(
    params: EndpointParams<'getNftByContractAndUserAddress'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getNftByContractAndUserAddress', params, opts);
  }

  /** Records of one token involving a wallet. */
  getRecordByUserAddressAndTokenId(
    params: EndpointParams<'getRecordByUserAddressAndTokenId'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getRecordByUserAddressAndTokenId', params, opts);
  }

  /** A single NFT. */
  getSingleNft(params: EndpointParams<'getSingleNft'>, opts?: SendOptions): SafeWrapAsync<Error, JsonValue> {
    return this.call('getSingleNft', params, opts);
  }

  /** Transaction records of a single NFT. */
  getSingleNftRecord(params: EndpointParams<'getSingleNftRecord'>, opts?: SendOptions): SafeWrapAsync<Error, JsonValue> {
    return this.call('getSingleNftRecord', params, opts);
  }

  /** Statistics of one or more contracts. */
  getStates(params: EndpointParams<'getStates'>, opts?: SendOptions): SafeWrapAsync<Error, JsonValue> {
    return this.call('getStates', params, opts);
  }

  /** Records of a wallet on one contract. */
  getUserRecordByContract(
    params: EndpointParams<'getUserRecordByContract'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getUserRecordByContract', params, opts);
  }

  /** All records of a wallet. */
  getUserRecordByUserAddress(
    params: EndpointParams<'getUserRecordByUserAddress'>,
    opts?: SendOptions,
  ): SafeWrapAsync<Error, JsonValue> {
    return this.call('getUserRecordByUserAddress', params, opts);
  }
}
