/**
 * Client configuration loader.
 *
 * Resolution order, per option:
 *  1. Inline overrides (constructor params)
 *  2. Environment variables (NFTSCAN_API_KEY, NFTSCAN_BASE_URL, ...)
 *  3. Defaults
 */

import { z } from 'zod';
import { ArgumentError } from '../error/argumentError.js';
import type { LogLevel } from '../logger/logger.js';
import type { RetryPolicy } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

export const DEFAULT_BASE_URL = 'https://restapi.nftscan.com/api/';
export const DEFAULT_AUTH_URL = 'https://restapi.nftscan.com/gw/token';
export const DEFAULT_VERSION = 'v1';
export const DEFAULT_TIMEOUT = 60_000;

const nonBlank = z.string().refine((value) => value.trim().length > 0, 'must not be blank');

const configSchema = z.object({
  apiKey: nonBlank,
  apiSecret: nonBlank,
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  version: nonBlank.default(DEFAULT_VERSION),
  authUrl: z.string().url().default(DEFAULT_AUTH_URL),
  timeout: z.union([z.number().int().positive(), z.literal(false)]).default(DEFAULT_TIMEOUT),
  retryOn: z.enum(['any', 'auth']).default('any'),
  refreshExpiredToken: z.boolean().default(true),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('silent'),
});

/** Fully resolved client configuration. */
export interface ClientConfig {
  /** NFTScan API key. */
  apiKey: string;
  /** NFTScan API secret, exchanged together with the key for an access token. */
  apiSecret: string;
  /** API base URL, the version segment is appended to it. */
  baseUrl: string;
  /** API version segment. */
  version: string;
  /** Authentication exchange URL. */
  authUrl: string;
  /** Request timeout in milliseconds, `false` disables it. */
  timeout: number | false;
  /** Which first-attempt failures re-authenticate and retry. */
  retryOn: RetryPolicy;
  /** Re-authenticate before sending when the held token is already expired. */
  refreshExpiredToken: boolean;
  logLevel: LogLevel;
}

export type ClientConfigInput = Partial<ClientConfig>;

function envTimeout(env: NodeJS.ProcessEnv): number | false | undefined {
  const raw = env.NFTSCAN_TIMEOUT;
  if (raw === undefined || raw === '') {
    return undefined;
  }

  const ms = Number(raw);
  return ms === 0 ? false : ms;
}

/**
 * Load config with resolution order: overrides → env → defaults, then validate it.
 */
export function loadConfig(
  overrides: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): SafeWrap<ArgumentError, ClientConfig> {
  const input = {
    apiKey: overrides.apiKey ?? env.NFTSCAN_API_KEY,
    apiSecret: overrides.apiSecret ?? env.NFTSCAN_API_SECRET,
    baseUrl: overrides.baseUrl ?? env.NFTSCAN_BASE_URL,
    version: overrides.version ?? env.NFTSCAN_API_VERSION,
    authUrl: overrides.authUrl ?? env.NFTSCAN_AUTH_URL,
    timeout: overrides.timeout ?? envTimeout(env),
    retryOn: overrides.retryOn ?? env.NFTSCAN_RETRY_ON,
    refreshExpiredToken: overrides.refreshExpiredToken,
    logLevel: overrides.logLevel ?? env.NFTSCAN_LOG_LEVEL,
  };

  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(({ message, path }) => ({ message, path }));
    return [new ArgumentError('error invalid client configuration', issues, { cause: result.error }), null];
  }

  return [null, result.data];
}
