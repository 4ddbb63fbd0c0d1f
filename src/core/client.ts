import type { KintoRequestError } from '../error/errorToString.js';
import { FetchClient, type FetchClientOptions } from '../fetch/client.js';
import { mergeHeaders } from '../fetch/utils.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  Header,
  HttpMethod,
  SendOptions,
} from '../types/request.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { headersForAuth } from './auth.js';
import { endpointUrl } from './endpoint.js';
import { encodeData } from './resource.js';
import { expectJson, expectPager } from './response.js';
import type { Auth, Client, Endpoint, ItemId, Pager, PendingRequest, Resource, ResponseInterpreter } from './types.js';

/** Header added to requests carrying a JSON body. */
const CONTENT_TYPE_JSON: Header = ['Content-Type', 'application/json'];

/** Configuration for constructing a {@link KintoClient}. */
export interface KintoClientProps {
  /** Server URL including the API version, e.g. `https://kinto.example.com/v1`. */
  baseUrl: string;
  /**
   * Credentials sent as the `Authorization` header.
   * @default { type: 'none' }
   */
  auth?: Auth;
  /** HTTP transport used by {@link KintoClient.send}. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Defaults for the transport, and the default timeout of {@link KintoClient.send}. */
  fetchOpts?: FetchClientOptions & Pick<SendOptions, 'timeout'>;
  /** Logger for dispatch and outcomes. Defaults to a pino logger at `KINTO_LOG_LEVEL`, silent otherwise. */
  logger?: Logger;
}

/**
 * Client for a Kinto server.
 *
 * The builder methods (`get`, `getList`, `create`, `update`, `replace`, `delete`) are
 * pure: each returns a {@link PendingRequest} describing one call, which modifiers
 * such as `filter`, `sort` and `limit` can refine. {@link KintoClient.send} dispatches
 * it and resolves with an error-first tuple; it never rejects.
 *
 * `baseUrl` and `headers` never change after construction, so one client can serve
 * any number of concurrent requests.
 *
 * @example
 * const client = new KintoClient({
 *   baseUrl: 'https://kinto.example.com/v1',
 *   auth: { type: 'basic', username: 'user', password: 'test-secret' },
 * });
 * const posts = recordResource('blog', 'posts', z.object({ id: z.string(), title: z.string() }));
 *
 * const [err, pager] = await client.send(limit(sort(client.getList(posts), ['-last_modified']), 20));
 */
export class KintoClient implements Client {
  /** Server URL requests are resolved against. */
  readonly baseUrl: string;
  /** Headers sent with every request, starting with `Authorization`. */
  readonly headers: readonly Header[];
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Default timeout of {@link KintoClient.send}; off unless configured. */
  #timeout: number | false;
  #logger: Logger;

  /**
   * Creates a client bound to one server and one set of credentials.
   *
   * @param props - Base URL, credentials, transport and logging options.
   */
  constructor({ baseUrl, auth = { type: 'none' }, fetchProvider = FetchClient, fetchOpts, logger }: KintoClientProps) {
    const { timeout = false, ...fetchClientOpts } = { ...fetchOpts };

    this.baseUrl = baseUrl;
    this.headers = Object.freeze([headersForAuth(auth)]);
    this.#timeout = timeout;
    this.#logger = logger ?? createLogger();
    this.#fetchClient = new fetchProvider({
      ...fetchClientOpts,
      headers: mergeHeaders([['Accept', 'application/json']], fetchClientOpts.headers),
    });
  }

  /**
   * Request for one object of `resource`.
   */
  get<T>(resource: Resource<T>, id: ItemId): PendingRequest<T> {
    return this.#request('get', resource.itemEndpoint(id), null, expectJson(resource.itemDecoder));
  }

  /**
   * Request for the first page of `resource`'s list endpoint.
   * Follow-up pages come from `loadNextPage`.
   */
  getList<T>(resource: Resource<T>): PendingRequest<Pager<T>> {
    return this.#request('get', resource.listEndpoint, null, expectPager(this, resource.listDecoder));
  }

  /**
   * Request creating an object in `resource`'s list; the server assigns the id
   * unless `data` carries one.
   */
  create<T>(resource: Resource<T>, data: unknown): PendingRequest<T> {
    return this.#request('post', resource.listEndpoint, encodeData(data), expectJson(resource.itemDecoder));
  }

  /**
   * Request merging `data` into an existing object (PATCH).
   */
  update<T>(resource: Resource<T>, id: ItemId, data: unknown): PendingRequest<T> {
    return this.#request('patch', resource.itemEndpoint(id), encodeData(data), expectJson(resource.itemDecoder));
  }

  /**
   * Request replacing an object with `data`, creating it if missing (PUT).
   */
  replace<T>(resource: Resource<T>, id: ItemId, data: unknown): PendingRequest<T> {
    return this.#request('put', resource.itemEndpoint(id), encodeData(data), expectJson(resource.itemDecoder));
  }

  /**
   * Request deleting an object. Kinto answers with the deleted object's tombstone,
   * so `resource`'s decoder must accept `{ id, last_modified, deleted }`.
   */
  delete<T>(resource: Resource<T>, id: ItemId): PendingRequest<T> {
    return this.#request('delete', resource.itemEndpoint(id), null, expectJson(resource.itemDecoder));
  }

  /**
   * Dispatches a request and interprets its response.
   *
   * Adds `Content-Type: application/json` to requests with a body. The optional
   * signal and timeout only bound the transport; aborts and timeouts resolve as
   * `NetworkError`, with `AbortError` / `TimeoutError` in the cause chain.
   *
   * @param request - Request built by this client, `loadNextPage`, or modifiers.
   * @param opts - Abort signal and timeout for this dispatch.
   * @returns A promise resolving to `[error, data]`.
   */
  async send<T>(request: PendingRequest<T>, opts: SendOptions = {}): SafeWrapAsync<KintoRequestError, T> {
    const { signal, timeout = this.#timeout } = opts;
    const timeoutSignal = createTimeoutSignal(timeout);
    const mergedSignal = mergeSignals([signal, timeoutSignal?.signal]);
    const options: FetchOptions = {
      headers: request.body === null ? request.headers : [...request.headers, CONTENT_TYPE_JSON],
      ...(request.body !== null && { body: request.body }),
      ...(mergedSignal && { signal: mergedSignal }),
    };

    this.#logger.debug({ method: request.method, url: request.url }, 'sending request');

    const [errDispatch, outcome] = await safeWrapAsync(() => this.#fetchClient[request.method](request.url, options));
    const transportOutcome: SafeWrap<Error, FetchResponse> = errDispatch
      ? [new Error(`error calling transport ${request.method.toUpperCase()}`, { cause: errDispatch }), null]
      : outcome;

    const result = await request.expect(transportOutcome);
    timeoutSignal?.clear();
    this.#logResult(request, transportOutcome, result);

    return result;
  }

  /**
   * Logs the outcome of one dispatch: network failures at `warn`, everything else at `debug`.
   */
  #logResult<T>(
    request: PendingRequest<T>,
    [errTransport, response]: SafeWrap<Error, FetchResponse>,
    [err]: SafeWrap<KintoRequestError, T>,
  ) {
    const context = { method: request.method, url: request.url };
    if (errTransport) {
      this.#logger.warn({ ...context, err: errTransport }, 'request failed before a response');
      return;
    }

    if (err) {
      this.#logger.debug({ ...context, status: response.status, err }, 'request returned an error');
      return;
    }

    this.#logger.debug({ ...context, status: response.status }, 'request succeeded');
  }

  /**
   * Builds a request against `endpoint` carrying this client's headers.
   */
  #request<T>(
    method: HttpMethod,
    endpoint: Endpoint,
    body: string | null,
    expect: ResponseInterpreter<T>,
  ): PendingRequest<T> {
    return {
      method,
      url: endpointUrl(this.baseUrl, endpoint),
      headers: this.headers,
      body,
      expect,
    };
  }
}
