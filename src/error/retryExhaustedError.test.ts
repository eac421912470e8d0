import { describe, expect, it } from 'vitest';
import { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';

describe('RetryExhaustedError', () => {
  it('exposes attempts via getter', () => {
    expect(new RetryExhaustedError('retries exhausted', 3).attempts).toBe(3);
  });

  it('is found through type guards', () => {
    const err = new RetryExhaustedError('retries exhausted', 3);

    expect(isRetryExhaustedError(err)).toBe(true);
    expect(getRetryExhaustedError(new Error('outer', { cause: err }))).toBe(err);
    expect(getRetryExhaustedError(new Error('boom'))).toBeNull();
  });
});
