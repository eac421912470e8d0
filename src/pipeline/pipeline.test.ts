import { afterEach, describe, expect, it, vi } from 'vitest';
import { Context } from '../context/context.js';
import { StaticTokenCredential } from '../credential/credential.js';
import { getHttpError, HTTPError } from '../error/httpError.js';
import { createLogger } from '../logger.js';
import type { FetchResponse, PipelineRequest, StatusCode } from '../types/request.js';
import { HttpPipeline, type HttpPipelineOptions } from './pipeline.js';
import type { HttpTransport, PipelinePolicy } from './types.js';
import { headersToObject } from './utils.js';

const request = (): PipelineRequest => ({
  url: new URL('https://vault.example/secrets/secret-name?api-version=7.5'),
  method: 'PUT',
  headers: new Headers({ 'Content-Type': 'application/json' }),
  body: '{"value":"secret-value"}',
});

const respond = (status: StatusCode): FetchResponse => new Response(null, { status }) as FetchResponse;

const stubTransport = () => ({ send: vi.fn<HttpTransport['send']>().mockResolvedValue([null, respond(200)]) });

const pipeline = (overrides: Partial<HttpPipelineOptions> = {}) =>
  new HttpPipeline({
    sdkName: 'vault-secrets-client',
    sdkVersion: '0.1.0',
    credential: new StaticTokenCredential('test-token'),
    scopes: ['https://vault.example/.default'],
    logger: createLogger(),
    retry: { limit: 1, timeout: 1 },
    ...overrides,
  });

describe('HttpPipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('runs the policies in order', () => {
    const extra = (name: string): PipelinePolicy => ({ name, send: (context, req, next) => next(context, req) });

    const names = pipeline({ perCallPolicies: [extra('perCall')], perRetryPolicies: [extra('perRetry')] }).policyNames;

    expect(names).toEqual(['headers', 'perCall', 'retry', 'timeout', 'bearerToken', 'perRetry', 'logging']);
  });

  it('sends the request with default and authorization headers', async () => {
    const transport = stubTransport();

    const [err, response] = await pipeline({ transport }).send(Context.empty(), request());

    expect(err).toBeNull();
    expect(response?.status).toBe(200);
    expect(transport.send).toHaveBeenCalledTimes(1);
    const [sent, signal] = transport.send.mock.calls[0];
    expect(sent.url.toString()).toBe('https://vault.example/secrets/secret-name?api-version=7.5');
    expect(sent.method).toBe('PUT');
    expect(sent.body).toBe('{"value":"secret-value"}');
    expect(headersToObject(sent.headers)).toEqual({
      accept: 'application/json',
      authorization: 'Bearer test-token',
      'content-type': 'application/json',
      'user-agent': 'vault-secrets-client/0.1.0',
    });
    expect(signal).toBeInstanceOf(AbortSignal);
  });

  it('includes configured default headers', async () => {
    const transport = stubTransport();

    await pipeline({ transport, headers: { 'X-Tenant': 'tenant-a' } }).send(Context.empty(), request());

    expect(transport.send.mock.calls[0][0].headers.get('x-tenant')).toBe('tenant-a');
  });

  it('forwards the caller signal when the timeout is disabled', async () => {
    const transport = stubTransport();
    const controller = new AbortController();

    await pipeline({ transport, timeout: false }).send(Context.from({ signal: controller.signal }), request());

    expect(transport.send.mock.calls[0][1]).toBe(controller.signal);
  });

  it('keeps the caller signal linked to the transport after the response arrives', async () => {
    const transport = stubTransport();
    const controller = new AbortController();

    await pipeline({ transport }).send(Context.from({ signal: controller.signal }), request());
    const signal = transport.send.mock.calls[0][1];
    controller.abort();

    expect(signal).not.toBe(controller.signal);
    expect(signal?.aborted).toBe(true);
  });

  it('retries through the transport and runs per-retry policies on each attempt', async () => {
    const transport = stubTransport();
    transport.send.mockResolvedValueOnce([new HTTPError(respond(503)), null]);
    const perCall = vi.fn<PipelinePolicy['send']>((context, req, next) => next(context, req));
    const perRetry = vi.fn<PipelinePolicy['send']>((context, req, next) => next(context, req));

    const [err] = await pipeline({
      transport,
      perCallPolicies: [{ name: 'perCall', send: perCall }],
      perRetryPolicies: [{ name: 'perRetry', send: perRetry }],
    }).send(Context.empty(), request());

    expect(err).toBeNull();
    expect(transport.send).toHaveBeenCalledTimes(2);
    expect(perCall).toHaveBeenCalledTimes(1);
    expect(perRetry).toHaveBeenCalledTimes(2);
  });

  it('keeps the HTTPError in the cause chain when retries run out', async () => {
    const transport = stubTransport();
    transport.send.mockResolvedValue([new HTTPError(respond(500)), null]);

    const [err, response] = await pipeline({ transport }).send(Context.empty(), request());

    expect(response).toBeNull();
    expect(getHttpError(err)?.status).toBe(500);
    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('turns a throwing policy into an error naming it', async () => {
    const cause = new Error('policy exploded');
    const broken: PipelinePolicy = {
      name: 'broken',
      send: () => {
        throw cause;
      },
    };

    const [err] = await pipeline({ transport: stubTransport(), perCallPolicies: [broken] }).send(
      Context.empty(),
      request(),
    );

    expect(err?.message).toBe('error in pipeline policy broken');
    expect(err?.cause).toBe(cause);
  });

  it('uses fetch when no transport is given', async () => {
    const mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    const [err] = await pipeline().send(Context.empty(), request());

    expect(err).toBeNull();
    expect(mockedFetch).toHaveBeenCalledTimes(1);
    expect(String(mockedFetch.mock.calls[0][0])).toBe('https://vault.example/secrets/secret-name?api-version=7.5');
  });
});
