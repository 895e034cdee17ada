import { describe, expect, it } from 'vitest';
import { createLogger, createRootLogger } from './logger.js';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const destination = {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  };

  return { lines, destination };
}

describe('createRootLogger', () => {
  it('is silent by default', () => {
    expect(createRootLogger().level).toBe('silent');
    expect(createRootLogger('debug').level).toBe('debug');
  });

  it('redacts credentials at the top level and one level deep', () => {
    const { lines, destination } = capture();
    const log = createRootLogger('info', destination);

    log.info({ apiKey: 'test-key', config: { apiSecret: 'test-secret' }, accessToken: 'tok123' }, 'configured');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      name: 'nftscan',
      apiKey: '[REDACTED]',
      config: { apiSecret: '[REDACTED]' },
      accessToken: '[REDACTED]',
      msg: 'configured',
    });
  });

  it('redacts the Access-Token header', () => {
    const { lines, destination } = capture();

    createRootLogger('info', destination).info({ headers: { 'access-token': 'tok123', accept: 'application/json' } });

    expect(lines[0]?.headers).toEqual({ 'access-token': '[REDACTED]', accept: 'application/json' });
  });
});

describe('createLogger', () => {
  it('tags lines with the module', () => {
    const { lines, destination } = capture();

    createLogger(createRootLogger('debug', destination), 'session').debug('authenticating');

    expect(lines[0]).toMatchObject({ module: 'session', msg: 'authenticating', level: 20 });
  });
});
