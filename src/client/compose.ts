import { SECRETS_PATH } from '../constants.js';
import { Context } from '../context/context.js';
import { DEFAULT_SET_SECRET_REQUEST, type SecretProperties, type SetSecretRequest } from '../models/secret.js';
import type { HttpMethod, PipelineRequest } from '../types/request.js';
import { constructResourceUrl } from '../utils/constructUrl.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Span marker added to the context of every set-secret call. */
export const SET_SECRET_OPERATION = 'SecretClient.setSecret';

/** Per-call options of set secret. Read, never stored or modified. */
export interface SetSecretOptions {
  /** Secret attributes, sent as `properties`. */
  properties?: SecretProperties;
  /** Free-form content type of the value, e.g. `text/plain`. */
  contentType?: string;
  /** Application tags. */
  tags?: Record<string, string>;
  /** Cancellation and tracing metadata for the call. */
  context?: Context;
}

/** A composed call ready for the pipeline. */
export interface ComposedCall {
  context: Context;
  request: PipelineRequest;
}

/**
 * Combines option bags left to right. A field left `undefined` keeps the earlier value.
 */
export function mergeSetSecretOptions(...sources: Array<SetSecretOptions | undefined>): SetSecretOptions {
  const merged: SetSecretOptions = {};

  for (const source of sources) {
    if (!source) {
      continue;
    }

    if (source.properties !== undefined) merged.properties = source.properties;
    if (source.contentType !== undefined) merged.contentType = source.contentType;
    if (source.tags !== undefined) merged.tags = source.tags;
    if (source.context !== undefined) merged.context = source.context;
  }

  return merged;
}

/**
 * Builds the set-secret body: the default request with `value`, then every option field that is
 * set. Unset fields never reach the body.
 */
export function buildSetSecretRequest(value: string, options: SetSecretOptions = {}): SetSecretRequest {
  const { properties, contentType, tags } = mergeSetSecretOptions(options);
  const request: SetSecretRequest = { ...DEFAULT_SET_SECRET_REQUEST, value };

  if (properties !== undefined) request.properties = properties;
  if (contentType !== undefined) request.contentType = contentType;
  if (tags !== undefined) request.tags = tags;

  return request;
}

/**
 * Composes the context and request of a set-secret call. Both call shapes of the client go
 * through here, so equal inputs always give equal requests.
 *
 * The caller's context is kept whole; the returned context only adds the operation span.
 */
export function composeSetSecret(
  endpoint: URL,
  method: HttpMethod,
  name: string,
  value: string,
  options: SetSecretOptions = {},
): SafeWrap<Error, ComposedCall> {
  const [errUrl, url] = constructResourceUrl(endpoint, SECRETS_PATH, name);
  if (errUrl) {
    return [new Error('error building set secret url', { cause: errUrl }), null];
  }

  const context = (options.context ?? Context.empty()).withSpan(SET_SECRET_OPERATION);
  const payload = buildSetSecretRequest(value, options);

  const [err, body] = safeWrap(() => JSON.stringify(payload));
  if (err) {
    return [new Error('error serializing set secret request', { cause: err }), null];
  }

  return [
    null,
    {
      context,
      request: {
        url,
        method,
        headers: new Headers({ 'Content-Type': 'application/json' }),
        body,
      },
    },
  ];
}
