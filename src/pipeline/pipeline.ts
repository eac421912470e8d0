import type { Context } from '../context/context.js';
import type { TokenCredential } from '../credential/credential.js';
import type { Logger } from '../logger.js';
import type { FetchResponse, HeaderOptions, PipelineRequest, RetryOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import {
  DEFAULT_TIMEOUT,
  bearerTokenPolicy,
  headersPolicy,
  loggingPolicy,
  retryPolicy,
  timeoutPolicy,
} from './policies.js';
import { FetchTransport } from './transport.js';
import type { HttpTransport, Pipeline, PipelinePolicy } from './types.js';

/** Options for {@link HttpPipeline}. */
export interface HttpPipelineOptions {
  /** SDK name, first half of the `User-Agent` header. */
  sdkName: string;
  /** SDK version, second half of the `User-Agent` header. */
  sdkVersion: string;
  /** Source of bearer tokens. */
  credential: TokenCredential;
  /** Scopes requested from the credential. */
  scopes: string[];
  logger: Logger;
  /**
   * Retry settings, or a plain retry count.
   * @default { limit: 2 }
   */
  retry?: RetryOptions | number;
  /**
   * Per-attempt timeout in milliseconds; `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /** Replaces the fetch transport, mainly for tests. */
  transport?: HttpTransport;
  /** Run once per call, before the retry loop. */
  perCallPolicies?: PipelinePolicy[];
  /** Run on every attempt, after authentication. */
  perRetryPolicies?: PipelinePolicy[];
}

/**
 * Default {@link Pipeline}. Policies run in this order:
 *
 * headers, per-call policies, retry, timeout, bearer token, per-retry policies, logging, transport.
 *
 * A policy that throws instead of returning a tuple is turned into an error naming the policy.
 */
export class HttpPipeline implements Pipeline {
  readonly #policies: readonly PipelinePolicy[];
  readonly #transport: HttpTransport;

  constructor({
    sdkName,
    sdkVersion,
    credential,
    scopes,
    logger,
    retry,
    timeout = DEFAULT_TIMEOUT,
    headers,
    transport = new FetchTransport(),
    perCallPolicies = [],
    perRetryPolicies = [],
  }: HttpPipelineOptions) {
    this.#transport = transport;
    this.#policies = [
      headersPolicy({ userAgent: `${sdkName}/${sdkVersion}`, headers }),
      ...perCallPolicies,
      retryPolicy({ retry, logger }),
      timeoutPolicy(timeout),
      bearerTokenPolicy({ credential, scopes }),
      ...perRetryPolicies,
      loggingPolicy(logger),
    ];
  }

  /** Names of the policies in the order they run. */
  get policyNames(): string[] {
    return this.#policies.map((policy) => policy.name);
  }

  send(context: Context, request: PipelineRequest): SafeWrapAsync<Error, FetchResponse> {
    return this.#run(0, context, request);
  }

  async #run(index: number, context: Context, request: PipelineRequest): SafeWrapAsync<Error, FetchResponse> {
    const policy = this.#policies[index];
    if (!policy) {
      return this.#transport.send(request, context.signal);
    }

    const next = (nextContext: Context, nextRequest: PipelineRequest) => this.#run(index + 1, nextContext, nextRequest);
    const [err, result] = await safeWrapAsync(() => policy.send(context, request, next));
    if (err) {
      return [new Error(`error in pipeline policy ${policy.name}`, { cause: err }), null];
    }

    return result;
  }
}
