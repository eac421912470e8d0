export { HttpPipeline, type HttpPipelineOptions } from './pipeline.js';
export {
  bearerTokenPolicy,
  type BearerTokenPolicyOptions,
  DEFAULT_RETRY_STATUS_CODES,
  DEFAULT_TIMEOUT,
  headersPolicy,
  type HeadersPolicyOptions,
  loggingPolicy,
  retryPolicy,
  type RetryPolicyOptions,
  timeoutPolicy,
} from './policies.js';
export { FetchTransport } from './transport.js';
export type { HttpTransport, NextPolicy, Pipeline, PipelinePolicy } from './types.js';
export { headersToObject, mergeHeaderOptions } from './utils.js';
