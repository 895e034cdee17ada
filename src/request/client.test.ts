import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { ExportError } from '../error/exportError.js';
import { BadRequestError, ForbiddenError, StatusError, UnauthorizedError } from '../error/statusError.js';
import { isTimeoutError, TimeoutError } from '../error/timeoutError.js';
import { FetchClient } from '../fetch/client.js';
import { createRootLogger } from '../logger/logger.js';
import { SessionClient } from '../session/client.js';
import type { RetryPolicy } from '../types/request.js';
import { RequestClient } from './client.js';

const API_URL = 'https://restapi.nftscan.com/api/v1';
const AUTH_URL = 'https://restapi.nftscan.com/gw/token';
const NOW = 1_000_000;

const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });
const tokenResponse = (accessToken = 'tok123', expiration = 3600) =>
  jsonResponse({ code: 200, data: { accessToken, expiration } });

describe('RequestClient', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
    vi.spyOn(Date, 'now').mockReturnValue(NOW);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  const createClient = (opts: { retryOn?: RetryPolicy; refreshExpiredToken?: boolean; timeout?: number | false } = {}) => {
    const fetchClient = new FetchClient(API_URL, { headers: { Accept: 'application/json' } });
    const logger = createRootLogger();
    const session = new SessionClient({
      fetchClient,
      credentials: { apiKey: 'test-key', apiSecret: 'test-secret' },
      authUrl: AUTH_URL,
      logger,
    });

    return { session, client: new RequestClient({ fetchClient, session, logger, timeout: false, ...opts }) };
  };

  const calledUrl = (call: number) => String(mockedFetch.mock.calls[call]?.[0]);

  const calledHeader = (call: number, name: string) => {
    const headers = mockedFetch.mock.calls[call]?.[1]?.headers;
    return headers instanceof Headers ? headers.get(name) : null;
  };

  const calledBody = (call: number): unknown => JSON.parse(String(mockedFetch.mock.calls[call]?.[1]?.body));

  describe('send', () => {
    it('posts the JSON body to the versioned endpoint and returns the envelope data', async () => {
      const response = jsonResponse({ code: 200, data: { nft_address: '0xabc' }, msg: 'ok' });
      mockedFetch.mockResolvedValueOnce(response);
      const { client } = createClient();

      const [err, exchange] = await client.send('getSingleNft', { nft_address: '0xabc', token_id: '1' });

      expect(err).toBeNull();
      expect(exchange?.data).toEqual({ nft_address: '0xabc' });
      expect(exchange?.response).toBe(response);
      expect(calledUrl(0)).toBe(`${API_URL}/getSingleNft`);
      expect(mockedFetch.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(calledBody(0)).toEqual({ nft_address: '0xabc', token_id: '1' });
      expect(calledHeader(0, 'Content-Type')).toBe('application/json');
      expect(calledHeader(0, 'Accept')).toBe('application/json');
    });

    it('sends no Access-Token before authenticating', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ code: 200, data: [] }));
      const { client } = createClient();

      await client.send('getStates', { nft_address: ['0xabc'] });

      expect(calledHeader(0, 'Access-Token')).toBeNull();
    });

    it('carries the current token in Access-Token', async () => {
      mockedFetch.mockResolvedValueOnce(tokenResponse('tok123')).mockResolvedValueOnce(jsonResponse({ code: 200, data: [] }));
      const { client } = createClient();

      await client.authenticate();
      await client.send('getStates', { nft_address: ['0xabc'] });

      expect(calledUrl(0)).toBe(`${AUTH_URL}?apiKey=test-key&apiSecret=test-secret`);
      expect(calledHeader(1, 'Access-Token')).toBe('tok123');
    });

    it('maps the HTTP status and the envelope code', async () => {
      mockedFetch
        .mockResolvedValueOnce(new Response('rejected', { status: 400 }))
        .mockResolvedValueOnce(jsonResponse({ code: 403, data: null }));
      const { client } = createClient();

      const [errHttp] = await client.send('getStates', {});
      const [errEnvelope] = await client.send('getStates', {});

      expect(errHttp).toBeInstanceOf(BadRequestError);
      expect(errHttp instanceof StatusError && errHttp.source).toBe('http');
      expect(errEnvelope).toBeInstanceOf(ForbiddenError);
      expect(errEnvelope instanceof StatusError && errEnvelope.source).toBe('envelope');
    });

    it('aborts with a TimeoutError once the timeout elapses', async () => {
      mockedFetch.mockImplementationOnce(
        (_, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
          }),
      );
      const { client } = createClient();

      const [err] = await client.send('getStates', {}, { timeout: 10 });

      expect(err).toBeInstanceOf(TimeoutError);
      expect(err?.message).toBe('error request timed out after 10ms');
    });

    it('reports a timeout while the body is being read as a TimeoutError', async () => {
      mockedFetch.mockImplementationOnce(async (_, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"code":200,'));
            init?.signal?.addEventListener('abort', () => controller.error(init?.signal?.reason));
          },
        });
        return new Response(body);
      });
      const { client } = createClient();

      const [err] = await client.send('getStates', {}, { timeout: 20 });

      expect(isTimeoutError(err)).toBe(true);
      expect(err?.message).toBe('error request timed out after 20ms');
    });

    it('fails every request after dispose', async () => {
      mockedFetch.mockImplementation((_, init) => Promise.reject(init?.signal?.reason));
      const { client } = createClient();

      client.dispose();
      const [err] = await client.send('getStates', {});

      expect(err?.name).toBe('AbortError');
      expect(err?.message).toBe('error client was disposed');
    });

    describe('exportFile', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'nftscan-request-'));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('writes the data payload to the file', async () => {
        const data = { content: [{ token_id: '1' }], total: 1 };
        mockedFetch.mockResolvedValueOnce(jsonResponse({ code: 200, data }));
        const path = join(dir, 'export.json');
        const { client } = createClient();

        const [err, exchange] = await client.send('getSingleNftRecord', {}, { exportFile: path });

        expect(err).toBeNull();
        expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(exchange?.data);
      });

      it('reports a file that cannot be written', async () => {
        mockedFetch.mockResolvedValueOnce(jsonResponse({ code: 200, data: {} }));
        const path = join(dir, 'missing', 'export.json');
        const { client } = createClient();

        const [err] = await client.send('getSingleNft', {}, { exportFile: path });

        expect(err).toBeInstanceOf(ExportError);
        expect(err?.message).toBe(`error exporting response to ${path}`);
      });
    });
  });

  describe('sendAuthenticated', () => {
    it.each([
      ['HTTP status 401', () => new Response('unauthorized', { status: 401 })],
      ['envelope code 401', () => jsonResponse({ code: 401, data: null })],
    ])('re-authenticates once and retries once on %s', async (_, firstResponse) => {
      mockedFetch
        .mockResolvedValueOnce(firstResponse())
        .mockResolvedValueOnce(tokenResponse('tok123'))
        .mockResolvedValueOnce(jsonResponse({ code: 200, data: { total: 3 } }));
      const { client } = createClient();

      const [err, exchange] = await client.sendAuthenticated('getMintByUserAddress', { user_address: '0xabc' });

      expect(err).toBeNull();
      expect(exchange?.data).toEqual({ total: 3 });
      expect(mockedFetch).toHaveBeenCalledTimes(3);
      expect(calledUrl(1)).toBe(`${AUTH_URL}?apiKey=test-key&apiSecret=test-secret`);
      expect(calledUrl(2)).toBe(`${API_URL}/getMintByUserAddress`);
      expect(calledHeader(2, 'Access-Token')).toBe('tok123');
      expect(calledBody(2)).toEqual({ user_address: '0xabc' });
    });

    it('returns the error of the retry unchanged', async () => {
      mockedFetch
        .mockResolvedValueOnce(jsonResponse({ code: 401, data: null }))
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ code: 400, data: null }));
      const { client } = createClient();

      const [err, exchange] = await client.sendAuthenticated('getStates', {});

      expect(exchange).toBeNull();
      expect(err).toBeInstanceOf(BadRequestError);
      expect(err?.message).toBe('error bad request (envelope status 400)');
      expect(mockedFetch).toHaveBeenCalledTimes(3);
    });

    it('returns a failed re-authentication without retrying', async () => {
      mockedFetch
        .mockResolvedValueOnce(jsonResponse({ code: 401, data: null }))
        .mockResolvedValueOnce(new Response('blocked', { status: 403 }));
      const { client } = createClient();

      const [err] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeInstanceOf(ForbiddenError);
      expect(err instanceof StatusError && err.body).toBe('blocked');
      expect(mockedFetch).toHaveBeenCalledTimes(2);
    });

    it('retries any failure by default', async () => {
      mockedFetch
        .mockResolvedValueOnce(jsonResponse({ code: 400, data: null }))
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ code: 200, data: 'ok' }));
      const { client } = createClient();

      const [err, exchange] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeNull();
      expect(exchange?.data).toBe('ok');
    });

    it('does not retry a bad request when retrying on auth failures only', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ code: 400, data: null }));
      const { client } = createClient({ retryOn: 'auth' });

      const [err] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeInstanceOf(BadRequestError);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });

    it('retries a forbidden response when retrying on auth failures only', async () => {
      mockedFetch
        .mockResolvedValueOnce(jsonResponse({ code: 403, data: null }))
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ code: 200, data: [] }));
      const { client } = createClient();
      client.config({ retryOn: 'auth' });

      const [err] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeNull();
      expect(mockedFetch).toHaveBeenCalledTimes(3);
    });

    it('does not retry a request aborted by the caller', async () => {
      mockedFetch.mockImplementation((_, init) => Promise.reject(init?.signal?.reason));
      const controller = new AbortController();
      controller.abort();
      const { client } = createClient();

      const [err] = await client.sendAuthenticated('getStates', {}, { signal: controller.signal });

      expect(err?.name).toBe('AbortError');
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });

    it('keeps a concurrent request going when another caller aborts during re-authentication', async () => {
      let resolveToken: (response: Response) => void = () => {};
      mockedFetch.mockImplementation((input, init) => {
        if (String(input).startsWith(AUTH_URL)) {
          return new Promise<Response>((resolve) => {
            resolveToken = resolve;
          });
        }

        const token = init?.headers instanceof Headers ? init.headers.get('Access-Token') : null;
        return Promise.resolve(token ? jsonResponse({ code: 200, data: 'ok' }) : jsonResponse({ code: 401, data: null }));
      });
      const controller = new AbortController();
      const { client } = createClient();

      const aborting = client.sendAuthenticated('getStates', {}, { signal: controller.signal });
      const waiting = client.sendAuthenticated('getStates', {});
      const authCalls = () => mockedFetch.mock.calls.filter(([input]) => String(input).startsWith(AUTH_URL));
      await vi.waitFor(() => expect(authCalls()).toHaveLength(1));
      controller.abort();
      const [errAborting] = await aborting;
      resolveToken(tokenResponse('tok123'));
      const [errWaiting, exchange] = await waiting;

      expect(errAborting?.name).toBe('AbortError');
      expect(errWaiting).toBeNull();
      expect(exchange?.data).toBe('ok');
      expect(authCalls()).toHaveLength(1);
    });

    it('refreshes an expired token before the first attempt', async () => {
      mockedFetch
        .mockResolvedValueOnce(tokenResponse('stale', 0))
        .mockResolvedValueOnce(tokenResponse('fresh'))
        .mockResolvedValueOnce(jsonResponse({ code: 200, data: [] }));
      const { client, session } = createClient();
      await client.authenticate();

      expect(session.isExpired()).toBe(true);

      const [err] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeNull();
      expect(calledUrl(1)).toBe(`${AUTH_URL}?apiKey=test-key&apiSecret=test-secret`);
      expect(calledHeader(2, 'Access-Token')).toBe('fresh');
    });

    it('sends with the expired token when proactive refresh is off', async () => {
      mockedFetch
        .mockResolvedValueOnce(tokenResponse('stale', 0))
        .mockResolvedValueOnce(jsonResponse({ code: 200, data: [] }));
      const { client } = createClient({ refreshExpiredToken: false });
      await client.authenticate();

      await client.sendAuthenticated('getStates', {});

      expect(mockedFetch).toHaveBeenCalledTimes(2);
      expect(calledHeader(1, 'Access-Token')).toBe('stale');
    });

    it('surfaces the unauthorized error when the retry is rejected as well', async () => {
      mockedFetch
        .mockResolvedValueOnce(jsonResponse({ code: 401, data: null }))
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(new Response('still unauthorized', { status: 401 }));
      const { client } = createClient();

      const [err] = await client.sendAuthenticated('getStates', {});

      expect(err).toBeInstanceOf(UnauthorizedError);
      expect(err instanceof StatusError && err.source).toBe('http');
      expect(mockedFetch).toHaveBeenCalledTimes(3);
    });
  });
});
