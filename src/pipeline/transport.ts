import { HTTPError } from '../error/httpError.js';
import type { FetchResponse, PipelineRequest } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { HttpTransport } from './types.js';

/**
 * Transport over the platform `fetch`.
 *
 * Errors:
 * - Network / fetch errors (including aborts) are wrapped in `Error` with the original as `cause`.
 * - Non-2xx responses are wrapped in `HTTPError`.
 */
export class FetchTransport implements HttpTransport {
  async send(request: PipelineRequest, signal?: AbortSignal): SafeWrapAsync<Error, FetchResponse> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        ...(signal && { signal }),
      }),
    );

    if (err) {
      return [new Error(`error sending ${request.method} request in FetchTransport`, { cause: err }), null];
    }

    // Cast this for some more type-safety on status codes
    const response = res as FetchResponse;
    if (!response.ok) {
      return [new HTTPError(response, `error in ${request.method} request in FetchTransport`), null];
    }

    return [null, response];
  }
}
