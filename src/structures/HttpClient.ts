import { Context, Data, Effect, Layer, Predicate, Schedule } from 'effect';
import got from 'got';
import UserAgent from 'user-agents';

import type { Got, OptionsInit, Response } from 'got';

/**
 * Represents errors occurring during HTTP requests.
 */
export class HttpClientError extends Data.TaggedError('HttpClientError')<{
  readonly message: string;
  readonly code?: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

/**
 * List of network error codes that are considered retryable.
 */
export const ERROR_CODES: readonly string[] = [
  'EADDRINUSE',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ENETUNREACH',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
];

/**
 * List of HTTP status codes that are considered retryable.
 */
export const ERROR_STATUS_CODES: readonly number[] = [408, 413, 429, 500, 502, 503, 504, 521, 522, 524];

/**
 * Request options, compatible with `got` except for retry and timeout which are
 * handled here.
 */
export interface DefaultOptions extends Omit<OptionsInit, 'prefixUrl' | 'retry' | 'timeout' | 'resolveBodyOnly' | 'isStream'> {
  readonly url: string;
  readonly retry?: number;
  readonly timeout?: Partial<{
    readonly initial: number;
    readonly transmission: number;
    readonly total: number;
  }>;
}

export interface HttpResponse<T> {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string | string[] | undefined>>;
  readonly body: T;
}

export interface HttpClient {
  readonly request: <T = string>(options: string | DefaultOptions) => Effect.Effect<HttpResponse<T>, HttpClientError>;
}

export class HttpClientTag extends Context.Tag('@structures/HttpClient')<HttpClientTag, HttpClient>() {}

const gotInstance: Got = got.extend({});
const userAgent = new UserAgent({ deviceCategory: 'desktop' });

export const isErrorTimeout = (error: unknown): boolean =>
  (Predicate.hasProperty(error, '_tag') && error._tag === 'TimeoutException') || (Predicate.hasProperty(error, 'code') && error.code === 'ETIMEDOUT');

/**
 * Whether a failed request may be attempted again: network failures and the
 * status codes in {@link ERROR_STATUS_CODES}.
 */
export const isRetryable = (error: HttpClientError): boolean => {
  const isNetworkError = !!error.code && ERROR_CODES.includes(error.code);
  const isRetryableStatus = !!error.status && ERROR_STATUS_CODES.includes(error.status);
  return isNetworkError || isRetryableStatus || isErrorTimeout(error);
};

const toHttpClientError = (error: unknown): HttpClientError => {
  if (error instanceof Error) {
    const code = Predicate.hasProperty(error, 'code') && typeof error.code === 'string' ? error.code : undefined;
    const response = Predicate.hasProperty(error, 'response') ? error.response : undefined;
    const status = Predicate.hasProperty(response, 'statusCode') && typeof response.statusCode === 'number' ? response.statusCode : undefined;
    return new HttpClientError({ message: error.message || 'Request failed', code, status, cause: error });
  }
  return new HttpClientError({ message: String(error), cause: error });
};

/**
 * Executes an HTTP request with retries on transient failures and got's timeouts.
 * Other HTTP error statuses resolve as responses; callers inspect `statusCode`.
 */
const requestFn = <T = string>(options: string | DefaultOptions): Effect.Effect<HttpResponse<T>, HttpClientError> =>
  Effect.suspend(() => {
    const opts: DefaultOptions = typeof options === 'string' ? { url: options } : options;
    const { retry = 3, timeout = {}, ...payload } = opts;
    const { initial = 10_000, transmission = 30_000, total = 60_000 } = timeout;

    return Effect.tryPromise({
      try: (signal) => {
        const promise = gotInstance({
          ...payload,
          headers: { 'user-agent': userAgent.toString(), ...payload.headers },
          http2: true,
          throwHttpErrors: false,
          retry: { limit: 0 },
          timeout: {
            lookup: initial,
            connect: initial,
            secureConnect: initial,
            socket: transmission,
            response: transmission,
            send: transmission,
            request: total,
          },
          resolveBodyOnly: false,
        });

        signal.addEventListener(
          'abort',
          () => {
            if ('cancel' in promise) {
              promise.cancel();
            }
          },
          { once: true },
        );

        return promise as unknown as Promise<Response<T>>;
      },
      catch: toHttpClientError,
    }).pipe(
      Effect.flatMap((response) =>
        ERROR_STATUS_CODES.includes(response.statusCode)
          ? Effect.fail(new HttpClientError({ message: `Request failed with status ${response.statusCode}`, status: response.statusCode }))
          : Effect.succeed<HttpResponse<T>>(response),
      ),
      Effect.retry({
        while: isRetryable,
        schedule: Schedule.exponential('500 millis').pipe(Schedule.intersect(Schedule.recurs(Math.max(0, retry)))),
      }),
    );
  });

/**
 * Helper to execute an HTTP request using the HttpClient service from the environment.
 */
export const request = <T = string>(options: string | DefaultOptions) => Effect.flatMap(HttpClientTag, (service) => service.request<T>(options));

export const HttpClientLayer: Layer.Layer<HttpClientTag> = Layer.succeed(HttpClientTag, HttpClientTag.of({ request: requestFn }));
