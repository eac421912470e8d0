import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body into a tuple-style result.
 *
 * - 204 and 205 give `[null, null]`; they carry no body.
 * - An empty body gives `[null, null]`.
 * - A `Content-Type` containing `application/json` or `+json` is parsed as JSON.
 * - Anything else is returned as text.
 *
 * The body is read once via `text()`, so the response cannot be read again afterwards.
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, unknown> {
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const contentType = response.headers?.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
