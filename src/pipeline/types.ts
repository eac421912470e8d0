import type { Context } from '../context/context.js';
import type { FetchResponse, PipelineRequest } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Sends a request through ordered policies and a transport. The client only depends on this
 * interface; {@link HttpPipeline} is the default implementation.
 */
export interface Pipeline {
  send(context: Context, request: PipelineRequest): SafeWrapAsync<Error, FetchResponse>;
}

/** Hands the (possibly replaced) context and request to the next stage. */
export type NextPolicy = (context: Context, request: PipelineRequest) => SafeWrapAsync<Error, FetchResponse>;

/** A single pipeline stage that may inspect or replace the request, or act on the result. */
export interface PipelinePolicy {
  /** Name used in logs. */
  name: string;
  send(context: Context, request: PipelineRequest, next: NextPolicy): SafeWrapAsync<Error, FetchResponse>;
}

/** Final pipeline step that performs the network call. */
export interface HttpTransport {
  send(request: PipelineRequest, signal?: AbortSignal): SafeWrapAsync<Error, FetchResponse>;
}
