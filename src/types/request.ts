import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** A single header as an ordered `[name, value]` pair. */
export type Header = readonly [name: string, value: string];

/**
 * Header options accepted by the fetch wrapper: ordered pairs, or a record where
 * `null` / `undefined` drops a header set by an earlier layer.
 */
export type HeaderOptions = readonly Header[] | Readonly<Record<string, string | null | undefined>>;

/** HTTP verbs used against the Kinto API. */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export interface FetchOptions extends Omit<RequestInit, 'headers' | 'method'> {
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/**
 * The parts of a fetch `Response` the response interpreter reads.
 * Any `Response` satisfies it.
 */
export type FetchResponse = Pick<Response, 'ok' | 'status' | 'statusText' | 'headers' | 'text'>;

/**
 * Contract for HTTP transports used by `KintoClient`.
 *
 * A transport resolves with the response for every status code; only failures to get
 * a response at all (network, abort, timeout) resolve as errors.
 */
export interface FetchClientProviderDefinition {
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  put: (url: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  patch: (url: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  delete: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}

/** Per-dispatch options for `KintoClient.send`. */
export interface SendOptions {
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * Defaults to the client's `fetchOpts.timeout`.
   */
  timeout?: number | false;
}
