/** Header options accepted by the pipeline and client options. `null` removes a header while merging. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** HTTP methods the pipeline can send. */
export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'PATCH' | 'DELETE';

/** Subset of HTTP status codes used for retry logic. */
export type StatusCode =
  | 100
  | 101
  | 102
  | 103
  | 200
  | 201
  | 202
  | 203
  | 204
  | 205
  | 206
  | 207
  | 208
  | 214
  | 226
  | 300
  | 301
  | 302
  | 303
  | 304
  | 305
  | 307
  | 308
  | 400
  | 401
  | 402
  | 403
  | 404
  | 405
  | 406
  | 407
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 414
  | 415
  | 416
  | 417
  | 418
  | 421
  | 422
  | 423
  | 424
  | 425
  | 426
  | 428
  | 429
  | 431
  | 451
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505
  | 506
  | 507
  | 508
  | 510
  | 511;

/** Retry configuration for the default pipeline. */
export type RetryOptions = {
  /**
   * The number of times to retry failed requests.
   * @default 2
   */
  limit?: number;
  /**
   * Milliseconds to wait between attempts.
   * @default 1000
   */
  timeout?: number;
} & (
  | {
      /**
       * The HTTP status codes allowed to retry.
       * @default [408, 429, 500, 501, 502, 503, 504]
       */
      statusCodes?: StatusCode[];
      ignoreStatusCodes?: never;
    }
  | {
      /**
       * The HTTP status codes skipping retries.
       */
      ignoreStatusCodes?: StatusCode[];
      statusCodes?: never;
    }
);

/**
 * Outbound request as it travels through the pipeline.
 * Policies never mutate a request in place; they hand a new one to the next stage.
 */
export interface PipelineRequest {
  url: URL;
  method: HttpMethod;
  headers: Headers;
  /** Serialized body, usually JSON. */
  body?: string;
}

/** Raw transport response with a typed status. */
export interface FetchResponse extends Response {
  status: StatusCode;
}
