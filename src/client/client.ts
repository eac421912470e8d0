import { type ResolvedClientConfig, resolveClientConfig, type SecretClientOptions } from '../config/client.js';
import type { TokenCredential } from '../credential/credential.js';
import type { ConfigError } from '../error/configError.js';
import { OperationError } from '../error/operationError.js';
import type { Logger } from '../logger.js';
import type { HttpTransport, Pipeline } from '../pipeline/types.js';
import type { FetchResponse, HeaderOptions, HttpMethod, RetryOptions } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { composeSetSecret, SET_SECRET_OPERATION, type SetSecretOptions } from './compose.js';
import { SetSecretBuilder } from './setSecretBuilder.js';

/**
 * Client for the secrets REST API.
 *
 * Set secret comes in two shapes that send identical requests for identical input:
 * - {@link SecretClient.setSecret} takes an options object and sends right away,
 * - {@link SecretClient.setSecretBuilder} stages the options and sends on `send()`.
 *
 * The client is immutable and can be shared between concurrent calls. All methods return
 * error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 *
 * @example
 * const [err, client] = SecretClient.create('https://vault.example/', new StaticTokenCredential(token));
 * if (err) return;
 * const [sendErr, response] = await client.setSecret('secret-name', 'secret-value', { tags: { env: 'dev' } });
 */
export class SecretClient {
  /** Frozen configuration; never changes after construction. */
  readonly #config: ResolvedClientConfig;

  private constructor(config: ResolvedClientConfig) {
    this.#config = config;
  }

  /**
   * Creates a client. Fails with a {@link ConfigError} when the endpoint cannot be parsed or is
   * not `http(s)`. `options` is read, never kept.
   */
  static create(
    endpoint: string | URL,
    credential: TokenCredential,
    options?: SecretClientOptions,
  ): SafeWrap<ConfigError, SecretClient> {
    const [err, config] = resolveClientConfig(endpoint, credential, options);
    if (err) {
      return [err, null];
    }

    return [null, new SecretClient(config)];
  }

  /** Starts a {@link SecretClientBuilder}. */
  static builder(endpoint: string | URL, credential: TokenCredential): SecretClientBuilder {
    return new SecretClientBuilder(endpoint, credential);
  }

  /** Normalized endpoint, including `api-version`. Returns a copy. */
  get endpoint(): URL {
    return new URL(this.#config.endpoint);
  }

  /**
   * Sets a secret, creating a new version of it.
   *
   * Failures come back as an {@link OperationError} whose cause chain holds the original
   * error, e.g. an `HTTPError` for a non-2xx response.
   */
  setSecret(name: string, value: string, options?: SetSecretOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#dispatch(name, value, options);
  }

  /** Staged variant of {@link SecretClient.setSecret}; nothing is sent until `send()`. */
  setSecretBuilder(name: string, value: string): SetSecretBuilder {
    return new SetSecretBuilder(name, value, (n, v, options) => this.#dispatch(n, v, options));
  }

  async #dispatch(name: string, value: string, options?: SetSecretOptions): SafeWrapAsync<Error, FetchResponse> {
    const { endpoint, setSecretMethod, pipeline, logger } = this.#config;

    const [errCompose, call] = composeSetSecret(endpoint, setSecretMethod, name, value, options);
    if (errCompose) {
      return [
        new OperationError(`error composing request in ${SET_SECRET_OPERATION}`, SET_SECRET_OPERATION, {
          cause: errCompose,
        }),
        null,
      ];
    }

    const { context, request } = call;
    logger.debug(
      { operation: SET_SECRET_OPERATION, spans: context.spans, method: request.method, url: request.url.toString() },
      'composed request',
    );

    const [err, response] = await pipeline.send(context, request);
    if (err) {
      return [
        new OperationError(`error sending request in ${SET_SECRET_OPERATION}`, SET_SECRET_OPERATION, { cause: err }),
        null,
      ];
    }

    return [null, response];
  }
}

/**
 * Chained configuration for {@link SecretClient}. Each `with*` call records one option;
 * {@link SecretClientBuilder.build} validates them through {@link SecretClient.create}.
 *
 * @example
 * const [err, client] = SecretClient.builder(url, credential).withRetry({ limit: 3 }).build();
 */
export class SecretClientBuilder {
  readonly #endpoint: string | URL;
  readonly #credential: TokenCredential;
  #options: SecretClientOptions = {};

  constructor(endpoint: string | URL, credential: TokenCredential) {
    this.#endpoint = endpoint;
    this.#credential = credential;
  }

  withApiVersion(apiVersion: string): this {
    return this.#set({ apiVersion });
  }

  withScope(scope: string): this {
    return this.#set({ scope });
  }

  withRetry(retry: RetryOptions | number): this {
    return this.#set({ retry });
  }

  withTimeout(timeout: number | false): this {
    return this.#set({ timeout });
  }

  withHeaders(headers: HeaderOptions): this {
    return this.#set({ headers });
  }

  withLogger(logger: Logger): this {
    return this.#set({ logger });
  }

  withPipeline(pipeline: Pipeline): this {
    return this.#set({ pipeline });
  }

  withTransport(transport: HttpTransport): this {
    return this.#set({ transport });
  }

  withSetSecretMethod(setSecretMethod: HttpMethod): this {
    return this.#set({ setSecretMethod });
  }

  build(): SafeWrap<ConfigError, SecretClient> {
    return SecretClient.create(this.#endpoint, this.#credential, this.#options);
  }

  #set(options: SecretClientOptions): this {
    this.#options = { ...this.#options, ...options };
    return this;
  }
}
