import { type DestinationStream, type Level, type Logger, pino } from 'pino';

/** Levels accepted by the client, `silent` turns logging off. */
export type LogLevel = Level | 'silent';

const SECRET_FIELDS = ['apiKey', 'apiSecret', 'accessToken', 'token'];

/**
 * Root pino logger for the client, with credential redaction.
 *
 * Redacts apiKey, apiSecret, accessToken and token, their nested variants
 * (*.apiKey, ...) and the Access-Token request header.
 */
export function createRootLogger(level: LogLevel = 'silent', destination?: DestinationStream): Logger {
  const options = {
    name: 'nftscan',
    level,
    redact: {
      paths: [
        ...SECRET_FIELDS,
        ...SECRET_FIELDS.map((field) => `*.${field}`),
        'headers["access-token"]',
        'headers["Access-Token"]',
      ],
      censor: '[REDACTED]',
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Create a child logger with module context.
 *
 * @example
 * const log = createLogger(root, 'session');
 * log.info({ expiresAt }, 'authenticated');
 * // Output includes: { module: 'session', ... }
 */
export function createLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
