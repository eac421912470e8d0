import { describe, expect, it } from 'vitest';
import { createLogger } from './logger.js';

const collect = () => {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    destination: {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  };
};

describe('createLogger', () => {
  it('is silent by default', () => {
    const logger = createLogger();

    expect(logger.level).toBe('silent');
  });

  it('names log lines after the package', () => {
    const { lines, destination } = collect();
    const logger = createLogger({ level: 'debug', destination });

    logger.debug({ operation: 'SecretClient.setSecret' }, 'composed request');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      name: 'vault-secrets-client',
      msg: 'composed request',
      operation: 'SecretClient.setSecret',
    });
  });

  it('redacts authorization headers', () => {
    const { lines, destination } = collect();
    const logger = createLogger({ level: 'trace', destination });

    logger.trace({ headers: { authorization: 'Bearer test-token', accept: 'application/json' } }, 'sending request');

    expect(lines[0]?.headers).toEqual({ authorization: '[redacted]', accept: 'application/json' });
  });

  it('drops lines below the level', () => {
    const { lines, destination } = collect();
    const logger = createLogger({ level: 'warn', destination });

    logger.info('ignored');
    logger.warn('kept');

    expect(lines.map((line) => line.msg)).toEqual(['kept']);
  });
});
