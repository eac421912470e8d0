import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';

describe('isAbortError', () => {
  it('returns true for instances of AbortError', () => {
    expect(isAbortError(new AbortError('stopped'))).toBe(true);
  });

  it('returns true for the reason of an aborted signal', () => {
    const controller = new AbortController();
    controller.abort();

    expect(isAbortError(controller.signal.reason)).toBe(true);
  });

  it('returns false for non-abort errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
  });
});
