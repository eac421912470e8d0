import { describe, expect, it } from 'vitest';
import type { FetchResponse } from '../types/request.js';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('defaults the message to the status', () => {
    const err = new HTTPError(new Response(null, { status: 400 }) as FetchResponse);

    expect(err.message).toBe('HTTP Error: 400');
    expect(err.status).toBe(400);
    expect(isHttpError(err)).toBe(true);
  });

  it('returns a readable clone of the response each time', async () => {
    const err = new HTTPError(new Response('{"error":"forbidden"}', { status: 403 }) as FetchResponse);

    expect(await err.response.text()).toBe('{"error":"forbidden"}');
    expect(await err.response.text()).toBe('{"error":"forbidden"}');
  });

  it('does not crash on weird shaped responses', () => {
    const errorResponse = {
      ok: false,
      status: 401,
    } as FetchResponse;
    const err = new HTTPError(errorResponse);

    expect(getHttpError(err)?.response.status).toBe(401);
  });
});
