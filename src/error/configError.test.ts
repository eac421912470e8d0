import { describe, expect, it } from 'vitest';
import { ConfigError, getConfigError, isConfigError } from './configError.js';

describe('ConfigError', () => {
  it('exposes the endpoint input via getter', () => {
    const err = new ConfigError('error parsing endpoint', 'not a url');

    expect(err.url).toBe('not a url');
    expect(err.message).toBe('error parsing endpoint');
  });
});

describe('isConfigError', () => {
  it('returns true for instances of ConfigError', () => {
    expect(isConfigError(new ConfigError('bad', 'x'))).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isConfigError(new Error('boom'))).toBe(false);
  });
});

describe('getConfigError', () => {
  it('unwraps nested causes', () => {
    const err = new ConfigError('bad', 'x');

    expect(getConfigError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns null when no ConfigError exists', () => {
    expect(getConfigError(new Error('outer', { cause: new Error('inner') }))).toBeNull();
  });
});
