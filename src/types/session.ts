/** API credentials, exchanged for an access token. */
export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

/** Read-only view of the current authentication state. */
export interface Session {
  /** Bearer token sent as `Access-Token`, `null` until authenticated. */
  token: string | null;
  /** Token expiry as epoch milliseconds, `null` until authenticated. */
  expiresAt: number | null;
}

/** Options for a single authentication exchange. */
export interface AuthenticateOptions {
  /** Abort signal to cancel the exchange. */
  signal?: AbortSignal;
  /** Exchange timeout in milliseconds, `false` disables it. */
  timeout?: number | false;
}
