import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('describes the elapsed timeout', () => {
    const err = new TimeoutError(250);

    expect(err.timeout).toBe(250);
    expect(err.message).toBe('error request timed out after 250ms');
  });

  it('accepts a custom message', () => {
    expect(new TimeoutError(250, 'error token request timed out').message).toBe('error token request timed out');
  });
});

describe('isTimeoutError', () => {
  it('returns true for instances of TimeoutError', () => {
    expect(isTimeoutError(new TimeoutError(10))).toBe(true);
  });

  it('returns true when wrapped', () => {
    expect(isTimeoutError(new Error('outer', { cause: new TimeoutError(10) }))).toBe(true);
  });

  it('returns false for non TimeoutError errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});

describe('getTimeoutError', () => {
  it('finds the timeout through an attempt error', () => {
    const timeout = new TimeoutError(60_000);

    expect(getTimeoutError(new Error('error sending PUT request', { cause: timeout }))?.timeout).toBe(60_000);
  });
});
