/**
 * Root entrypoint: re-exports the secret client, configuration, pipeline building blocks and
 * error utilities. Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the secrets REST API, and its chained configuration builder.
 */
export { SecretClient, SecretClientBuilder } from './client/client.js';

/**
 * Per-call options of set secret, shared by both call shapes.
 */
export type { SetSecretOptions } from './client/compose.js';

/**
 * Staged form of set secret returned by `SecretClient.setSecretBuilder`.
 */
export { SetSecretBuilder } from './client/setSecretBuilder.js';

/**
 * Constructor options accepted by `SecretClient.create`.
 */
export type { SecretClientOptions } from './config/client.js';

/**
 * Environment configuration loader.
 */
export { type EnvConfig, loadEnvConfig } from './config/env.js';

/**
 * Package name and version reported in the `User-Agent` header.
 */
export { SDK_NAME, SDK_VERSION } from './constants.js';

/**
 * Cancellation and tracing carrier passed through a call.
 */
export { Context, type ContextInit } from './context/context.js';

/**
 * Token sources for the bearer-token policy.
 */
export { type AccessToken, StaticTokenCredential, type TokenCredential } from './credential/credential.js';

export * from './error/index.js';

/**
 * Structured logger used by the client and pipeline.
 */
export { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * Secret models and response decoding.
 */
export { decodeSecret, type Secret, type SecretProperties, type SetSecretRequest } from './models/secret.js';

/**
 * Default pipeline and the interfaces for replacing or extending it.
 */
export { HttpPipeline, type HttpPipelineOptions } from './pipeline/pipeline.js';
export type { HttpTransport, NextPolicy, Pipeline, PipelinePolicy } from './pipeline/types.js';

/**
 * Request and response types shared by the pipeline.
 */
export type {
  FetchResponse,
  HeaderOptions,
  HttpMethod,
  PipelineRequest,
  RetryOptions,
  StatusCode,
} from './types/request.js';

/**
 * Tuple-based result types returned by every operation.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
