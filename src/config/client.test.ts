import { describe, expect, it, vi } from 'vitest';
import { StaticTokenCredential } from '../credential/credential.js';
import { isConfigError } from '../error/configError.js';
import { createLogger } from '../logger.js';
import { HttpPipeline } from '../pipeline/pipeline.js';
import type { Pipeline } from '../pipeline/types.js';
import { resolveClientConfig } from './client.js';

const credential = new StaticTokenCredential('test-token');

describe('resolveClientConfig', () => {
  it('applies defaults', () => {
    const [err, config] = resolveClientConfig('https://vault.example', credential);

    expect(err).toBeNull();
    expect(config?.endpoint.toString()).toBe('https://vault.example/?api-version=7.5');
    expect(config?.setSecretMethod).toBe('PUT');
    expect(config?.pipeline).toBeInstanceOf(HttpPipeline);
    expect(config?.logger.level).toBe('silent');
  });

  it('returns a frozen configuration', () => {
    const [, config] = resolveClientConfig('https://vault.example', credential);

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('uses the supplied api version, method, logger and pipeline', () => {
    const pipeline: Pipeline = { send: vi.fn<Pipeline['send']>() };
    const logger = createLogger({ level: 'info' });

    const [, config] = resolveClientConfig('https://vault.example/tenant-a', credential, {
      apiVersion: '7.4',
      setSecretMethod: 'GET',
      logger,
      pipeline,
    });

    expect(config?.endpoint.toString()).toBe('https://vault.example/tenant-a/?api-version=7.4');
    expect(config?.setSecretMethod).toBe('GET');
    expect(config?.logger).toBe(logger);
    expect(config?.pipeline).toBe(pipeline);
  });

  it('does not modify the options object', () => {
    const options = { apiVersion: '7.4', retry: 1 };

    resolveClientConfig('https://vault.example', credential, options);

    expect(options).toEqual({ apiVersion: '7.4', retry: 1 });
  });

  it('returns a ConfigError for an invalid endpoint', () => {
    const [err, config] = resolveClientConfig('vault.example', credential);

    expect(config).toBeNull();
    expect(isConfigError(err)).toBe(true);
    expect(err?.url).toBe('vault.example');
  });
});
