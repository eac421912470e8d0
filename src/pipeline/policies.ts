import type { Context } from '../context/context.js';
import type { AccessToken, TokenCredential } from '../credential/credential.js';
import { isAbortError } from '../error/abortError.js';
import { AuthenticationError } from '../error/authenticationError.js';
import { getHttpError } from '../error/httpError.js';
import { isRetryExhaustedError } from '../error/retryExhaustedError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import type { Logger } from '../logger.js';
import type { HeaderOptions, RetryOptions, StatusCode } from '../types/request.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { PipelinePolicy } from './types.js';
import { headersToObject, mergeHeaderOptions } from './utils.js';

/** Default HTTP status codes to retry on when unspecified. */
export const DEFAULT_RETRY_STATUS_CODES: readonly StatusCode[] = [408, 429, 500, 501, 502, 503, 504];

/** Default per-attempt timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 60_000;

/** Options for {@link headersPolicy}. */
export interface HeadersPolicyOptions {
  /** Value of the `User-Agent` header. */
  userAgent: string;
  /** Extra default headers; request headers set by the client take precedence. */
  headers?: HeaderOptions;
}

/**
 * Applies `Accept`, `User-Agent` and configured default headers beneath the request's own headers.
 */
export function headersPolicy({ userAgent, headers }: HeadersPolicyOptions): PipelinePolicy {
  const defaults = mergeHeaderOptions({ Accept: 'application/json', 'User-Agent': userAgent }, headers);

  return {
    name: 'headers',
    send: (context, request, next) =>
      next(context, { ...request, headers: mergeHeaderOptions(defaults, request.headers) }),
  };
}

/** Options for {@link bearerTokenPolicy}. */
export interface BearerTokenPolicyOptions {
  credential: TokenCredential;
  scopes: string[];
  /**
   * A cached token this close to expiry is refreshed.
   * @default 120000
   */
  refreshWindowMs?: number;
  /** Clock, replaceable in tests. */
  now?: () => number;
}

/**
 * Sets `Authorization: Bearer <token>` on every attempt, reusing the last token until it is
 * within `refreshWindowMs` of expiry.
 */
export function bearerTokenPolicy({
  credential,
  scopes,
  refreshWindowMs = 120_000,
  now = Date.now,
}: BearerTokenPolicyOptions): PipelinePolicy {
  let cached: AccessToken | null = null;

  const acquire = async (signal?: AbortSignal): SafeWrapAsync<Error, AccessToken> => {
    if (cached && cached.expiresOnTimestamp - now() > refreshWindowMs) {
      return [null, cached];
    }

    const [err, token] = await safeWrapAsync(() => credential.getToken(scopes, { signal }));
    if (err) {
      return [new AuthenticationError('error acquiring access token', { cause: err }), null];
    }

    if (!token) {
      return [new AuthenticationError('error credential returned no access token'), null];
    }

    cached = token;
    return [null, token];
  };

  return {
    name: 'bearerToken',
    send: async (context, request, next) => {
      const [err, token] = await acquire(context.signal);
      if (err) {
        return [err, null];
      }

      return next(context, {
        ...request,
        headers: mergeHeaderOptions(request.headers, { Authorization: `Bearer ${token.token}` }),
      });
    },
  };
}

/** Retry settings with defaults applied. */
interface ResolvedRetry {
  limit: number;
  timeout: number;
  statusCodes: readonly StatusCode[];
  ignoreStatusCodes: readonly StatusCode[];
}

function resolveRetry(options: RetryOptions | number): ResolvedRetry {
  if (typeof options === 'number') {
    return { limit: options, timeout: 1000, statusCodes: DEFAULT_RETRY_STATUS_CODES, ignoreStatusCodes: [] };
  }

  return {
    limit: options.limit ?? 2,
    timeout: options.timeout ?? 1000,
    statusCodes: options.statusCodes ?? DEFAULT_RETRY_STATUS_CODES,
    ignoreStatusCodes: options.ignoreStatusCodes ?? [],
  };
}

/**
 * Decides whether a failed attempt ends the retry loop (true) or is retried (false).
 * Cancellation and authentication failures always stop; timeouts and network errors retry;
 * HTTP errors retry only on the configured status codes.
 */
function shouldStop(err: Error, context: Context, settings: ResolvedRetry): boolean {
  if (context.signal?.aborted) {
    return true;
  }

  if (unwrapErrorType(AuthenticationError, err)) {
    return true;
  }

  if (unwrapErrorType(TimeoutError, err)) {
    return false;
  }

  if (isAbortError(err)) {
    return true;
  }

  const httpError = getHttpError(err);
  if (!httpError) {
    return false;
  }

  if (settings.ignoreStatusCodes.includes(httpError.status)) {
    return true;
  }

  return !settings.statusCodes.includes(httpError.status);
}

/** Options for {@link retryPolicy}. */
export interface RetryPolicyOptions {
  /** Retry settings, or a plain retry count. @default { limit: 2 } */
  retry?: RetryOptions | number;
  logger: Logger;
}

/**
 * Re-runs the rest of the pipeline with a fixed delay between attempts. Everything after this
 * policy (timeout, authentication, logging, transport) runs once per attempt.
 */
export function retryPolicy({ retry: retryOptions = { limit: 2 }, logger }: RetryPolicyOptions): PipelinePolicy {
  const settings = resolveRetry(retryOptions);

  return {
    name: 'retry',
    send: async (context, request, next) => {
      const url = request.url.toString();
      const [err, response] = await retry({
        attempts: settings.limit,
        timeout: settings.timeout,
        signal: context.signal,
        errFn: (e) => shouldStop(e, context, settings),
        onRetry: (e, attempt) => logger.warn({ url, attempt, err: e }, 'retrying request'),
        fn: () => next(context, request),
      });

      if (err) {
        if (isRetryExhaustedError(err)) {
          logger.error({ url, err }, 'request retries exhausted');
        }

        return [err, null];
      }

      return [null, response];
    },
  };
}

/**
 * Bounds each attempt until its response headers arrive with a timeout merged into the context
 * signal. `false` or `0` disables the timeout; the caller's signal still applies.
 *
 * After a successful attempt the caller's signal stays linked to the transport signal, so
 * aborting it still cancels reading the response body.
 */
export function timeoutPolicy(timeout: number | false = DEFAULT_TIMEOUT): PipelinePolicy {
  return {
    name: 'timeout',
    send: async (context, request, next) => {
      const timeoutSignal = createTimeoutSignal(timeout);
      const merged = mergeSignals([context.signal, timeoutSignal?.signal]);
      let succeeded = false;

      try {
        const result = await next(merged ? context.withSignal(merged.signal) : context, request);
        succeeded = result[0] === null;
        return result;
      } finally {
        timeoutSignal?.dispose();
        if (!succeeded) {
          merged?.dispose();
        }
      }
    },
  };
}

/**
 * Logs each attempt: the request at `debug` (headers at `trace`, authorization redacted by the
 * logger), the status at `debug`, and failures at `warn`. Bodies are never logged.
 */
export function loggingPolicy(logger: Logger): PipelinePolicy {
  return {
    name: 'logging',
    send: async (context, request, next) => {
      const meta = { method: request.method, url: request.url.toString(), spans: context.spans };
      logger.debug(meta, 'sending request');
      logger.trace({ ...meta, headers: headersToObject(request.headers) }, 'request headers');

      const started = Date.now();
      const [err, response] = await next(context, request);
      const durationMs = Date.now() - started;
      if (err) {
        logger.warn({ ...meta, durationMs, status: getHttpError(err)?.status, err }, 'request failed');
        return [err, null];
      }

      logger.debug({ ...meta, durationMs, status: response.status }, 'received response');
      return [null, response];
    },
  };
}
