import { describe, expect, it } from 'vitest';
import { getOperationError, isOperationError, OperationError } from './operationError.js';

describe('OperationError', () => {
  it('exposes the operation and keeps the cause', () => {
    const cause = new Error('socket hang up');
    const err = new OperationError('error sending request', 'SecretClient.setSecret', { cause });

    expect(err.operation).toBe('SecretClient.setSecret');
    expect(err.cause).toBe(cause);
  });

  it('is found through type guards', () => {
    const err = new OperationError('error sending request', 'SecretClient.setSecret');

    expect(isOperationError(err)).toBe(true);
    expect(getOperationError(new Error('outer', { cause: err }))).toBe(err);
    expect(isOperationError(new Error('boom'))).toBe(false);
  });
});
