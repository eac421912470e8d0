import { DEFAULT_API_VERSION, DEFAULT_SCOPE, SDK_NAME, SDK_VERSION } from '../constants.js';
import type { TokenCredential } from '../credential/credential.js';
import type { ConfigError } from '../error/configError.js';
import { createLogger, type Logger } from '../logger.js';
import { HttpPipeline } from '../pipeline/pipeline.js';
import type { HttpTransport, Pipeline, PipelinePolicy } from '../pipeline/types.js';
import type { HeaderOptions, HttpMethod, RetryOptions } from '../types/request.js';
import { constructEndpoint } from '../utils/constructUrl.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Options accepted by `SecretClient.create`. The object is read, never kept or modified. */
export interface SecretClientOptions {
  /**
   * Service API version sent as `api-version`.
   * @default '7.5'
   */
  apiVersion?: string;
  /**
   * Scope requested from the credential.
   * @default 'https://vault.azure.net/.default'
   */
  scope?: string;
  /** Retry settings for the default pipeline, or a plain retry count. */
  retry?: RetryOptions | number;
  /** Per-attempt timeout in milliseconds for the default pipeline; `false` disables it. */
  timeout?: number | false;
  /** Headers sent with every request. */
  headers?: HeaderOptions;
  /** Logger for the client and the default pipeline. Silent when omitted. */
  logger?: Logger;
  /** Replaces the default pipeline entirely; the pipeline options above are then ignored. */
  pipeline?: Pipeline;
  /** Transport of the default pipeline. */
  transport?: HttpTransport;
  /** Extra policies of the default pipeline, run once per call. */
  perCallPolicies?: PipelinePolicy[];
  /** Extra policies of the default pipeline, run on every attempt. */
  perRetryPolicies?: PipelinePolicy[];
  /**
   * HTTP method used by set secret.
   * @default 'PUT'
   */
  setSecretMethod?: HttpMethod;
}

/** Client configuration after defaults are applied. Frozen. */
export interface ResolvedClientConfig {
  /** Normalized endpoint carrying the `api-version` query. */
  readonly endpoint: URL;
  readonly setSecretMethod: HttpMethod;
  readonly logger: Logger;
  readonly pipeline: Pipeline;
}

/**
 * Validates the endpoint and applies option defaults, building the default {@link HttpPipeline}
 * unless one is supplied.
 */
export function resolveClientConfig(
  endpoint: string | URL,
  credential: TokenCredential,
  options: SecretClientOptions = {},
): SafeWrap<ConfigError, ResolvedClientConfig> {
  const [err, url] = constructEndpoint(endpoint, options.apiVersion ?? DEFAULT_API_VERSION);
  if (err) {
    return [err, null];
  }

  const logger = options.logger ?? createLogger();
  const pipeline =
    options.pipeline ??
    new HttpPipeline({
      sdkName: SDK_NAME,
      sdkVersion: SDK_VERSION,
      credential,
      scopes: [options.scope ?? DEFAULT_SCOPE],
      logger,
      retry: options.retry,
      timeout: options.timeout,
      headers: options.headers,
      transport: options.transport,
      perCallPolicies: options.perCallPolicies,
      perRetryPolicies: options.perRetryPolicies,
    });

  return [
    null,
    Object.freeze({
      endpoint: url,
      setSecretMethod: options.setSecretMethod ?? 'PUT',
      logger,
      pipeline,
    }),
  ];
}
