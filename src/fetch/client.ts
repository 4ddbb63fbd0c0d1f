import type { FetchClientProviderDefinition, FetchOptions, FetchResponse, HeaderOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaders, toHeadersInit } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /** Default headers sent with every request; per-request headers override them. */
  headers?: HeaderOptions;
  /**
   * Fetch credentials mode.
   * {@link RequestCredentials}
   */
  credentials?: RequestCredentials;
  /** Fetch mode.
   * {@link RequestMode}
   */
  mode?: RequestMode;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default and per-request options,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every HTTP status resolves as a response; deciding what a status means is left
 * to the caller. Only a failure to obtain a response resolves as an error.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default fetch options (headers, credentials, mode). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request against the given absolute URL.
   *
   * @param url - Absolute URL (e.g. `https://kinto.example.com/v1/buckets`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, 'GET', { ...opts, body: undefined });
  }

  /**
   * Executes a PUT request against the given absolute URL.
   *
   * @param url - Absolute URL of the item to replace.
   * @param opts - Request options, including the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public put(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, 'PUT', opts);
  }

  /**
   * Executes a PATCH request against the given absolute URL.
   *
   * @param url - Absolute URL of the item to update.
   * @param opts - Request options, including the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public patch(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, 'PATCH', opts);
  }

  /**
   * Executes a POST request against the given absolute URL.
   *
   * @param url - Absolute URL of the list to create into.
   * @param opts - Request options, including the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, 'POST', opts);
  }

  /**
   * Executes a DELETE request against the given absolute URL.
   *
   * @param url - Absolute URL of the item to delete.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public delete(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, 'DELETE', { ...opts, body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors (including aborts) are wrapped in `Error` with the original as `cause`.
   */
  async #request(url: string, method: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const headers = new Headers(toHeadersInit(mergeHeaders(this.#opts.headers, opts.headers)));

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        body: opts.body,
        method,
        mode: opts.mode ?? this.#opts.mode,
        credentials: opts.credentials ?? this.#opts.credentials,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }
}
