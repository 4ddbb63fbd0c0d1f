import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { isAbortError } from '../error/abortError.js';
import { KintoError } from '../error/kintoError.js';
import { NetworkError } from '../error/networkError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import type { FetchClientOptions } from '../fetch/client.js';
import type { FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { KintoClient, type KintoClientProps } from './client.js';
import { limit } from './modifiers.js';
import { loadNextPage, mergePager } from './pager.js';
import { recordResource } from './resource.js';

const BASE_URL = 'http://localhost:8888/v1';
const RECORDS = `${BASE_URL}/buckets/blog/collections/posts/records`;

const transport = {
  get: vi.fn<FetchClientProviderDefinition['get']>(),
  post: vi.fn<FetchClientProviderDefinition['post']>(),
  put: vi.fn<FetchClientProviderDefinition['put']>(),
  patch: vi.fn<FetchClientProviderDefinition['patch']>(),
  delete: vi.fn<FetchClientProviderDefinition['delete']>(),
};
const constructed: FetchClientOptions[] = [];

class MockFetchProvider implements FetchClientProviderDefinition {
  get = transport.get;
  post = transport.post;
  put = transport.put;
  patch = transport.patch;
  delete = transport.delete;

  constructor(opts: FetchClientOptions) {
    constructed.push(opts);
  }
}

const posts = recordResource('blog', 'posts', z.object({ id: z.string(), title: z.string() }));

function json(body: unknown, init: ResponseInit = { status: 200, statusText: 'OK' }): SafeWrap<Error, Response> {
  return [null, new Response(JSON.stringify(body), init)];
}

function createClient(props: Partial<KintoClientProps> = {}) {
  return new KintoClient({
    baseUrl: BASE_URL,
    auth: { type: 'bearer', token: 'test-token' },
    fetchProvider: MockFetchProvider,
    ...props,
  });
}

beforeEach(() => {
  for (const mock of Object.values(transport)) {
    mock.mockReset();
  }
  constructed.length = 0;
});

afterEach(() => {
  vi.useRealTimers();
});

describe('KintoClient', () => {
  describe('constructor', () => {
    test('holds the base URL and exactly one Authorization header', () => {
      const client = createClient();

      expect(client.baseUrl).toBe(BASE_URL);
      expect(client.headers).toEqual([['Authorization', 'Bearer test-token']]);
      expect(Object.isFrozen(client.headers)).toBe(true);
    });

    test('sends an empty Authorization header without credentials', () => {
      const client = createClient({ auth: undefined });

      expect(client.headers).toEqual([['Authorization', '']]);
    });

    test('constructs the transport with JSON accept and the given options', () => {
      createClient({ fetchOpts: { credentials: 'include', headers: { 'X-Client': 'blog' }, timeout: 1000 } });

      expect(constructed).toHaveLength(1);
      const opts = constructed[0];
      expect(opts?.credentials).toBe('include');
      expect(opts).not.toHaveProperty('timeout');

      expect(opts?.headers).toEqual([
        ['Accept', 'application/json'],
        ['X-Client', 'blog'],
      ]);
    });
  });

  describe('builders', () => {
    const client = createClient();

    test('get targets the item endpoint without a body', () => {
      const request = client.get(posts, 'a1');

      expect(request).toMatchObject({ method: 'get', url: `${RECORDS}/a1`, body: null });
      expect(request.headers).toBe(client.headers);
    });

    test('getList targets the list endpoint', () => {
      expect(client.getList(posts)).toMatchObject({ method: 'get', url: RECORDS, body: null });
    });

    test('create posts the enveloped payload to the list endpoint', () => {
      expect(client.create(posts, { title: 'Hello' })).toMatchObject({
        method: 'post',
        url: RECORDS,
        body: '{"data":{"title":"Hello"}}',
      });
    });

    test('update patches the item endpoint', () => {
      expect(client.update(posts, 'a1', { title: 'Edited' })).toMatchObject({
        method: 'patch',
        url: `${RECORDS}/a1`,
        body: '{"data":{"title":"Edited"}}',
      });
    });

    test('replace puts the item endpoint', () => {
      expect(client.replace(posts, 'a1', { title: 'Replaced' })).toMatchObject({
        method: 'put',
        url: `${RECORDS}/a1`,
        body: '{"data":{"title":"Replaced"}}',
      });
    });

    test('delete targets the item endpoint without a body', () => {
      expect(client.delete(posts, 'a1')).toMatchObject({ method: 'delete', url: `${RECORDS}/a1`, body: null });
    });

    test('builders do not touch the transport', () => {
      client.create(posts, { title: 'Hello' });

      expect(transport.post).not.toHaveBeenCalled();
    });
  });

  describe('send', () => {
    test('dispatches a GET and decodes the object', async () => {
      const client = createClient();
      transport.get.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }));

      const [err, post] = await client.send(client.get(posts, 'a1'));

      expect(err).toBeNull();
      expect(post).toEqual({ id: 'a1', title: 'Hello' });
      expect(transport.get).toHaveBeenCalledWith(`${RECORDS}/a1`, { headers: client.headers });
    });

    test('adds the JSON content type to requests with a body', async () => {
      const client = createClient();
      transport.post.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }, { status: 201 }));

      const [err] = await client.send(client.create(posts, { title: 'Hello' }));

      expect(err).toBeNull();
      expect(transport.post).toHaveBeenCalledWith(RECORDS, {
        headers: [
          ['Authorization', 'Bearer test-token'],
          ['Content-Type', 'application/json'],
        ],
        body: '{"data":{"title":"Hello"}}',
      });
    });

    test.each(['update', 'replace'] as const)('%s uses its own verb', async (builder) => {
      const client = createClient();
      const verb = builder === 'update' ? transport.patch : transport.put;
      verb.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Edited' } }));

      const [err, post] = await client.send(client[builder](posts, 'a1', { title: 'Edited' }));

      expect(err).toBeNull();
      expect(post?.title).toBe('Edited');
      expect(verb).toHaveBeenCalledTimes(1);
    });

    test('resolves Kinto error bodies as KintoError', async () => {
      const client = createClient();
      transport.delete.mockResolvedValueOnce(
        json(
          { errno: 111, message: 'Resource not found', code: 404, error: 'Not Found' },
          { status: 404, statusText: 'Not Found' },
        ),
      );

      const [err, deleted] = await client.send(client.delete(posts, 'missing'));

      expect(deleted).toBeNull();
      expect(err).toBeInstanceOf(KintoError);
      expect(err instanceof KintoError && err.detail.errno).toBe(111);
    });

    test('resolves transport failures as NetworkError', async () => {
      const client = createClient();
      const cause = new Error('error wrapping GET request in fetchClient');
      transport.get.mockResolvedValueOnce([cause, null]);

      const [err] = await client.send(client.get(posts, 'a1'));

      expect(err).toBeInstanceOf(NetworkError);
      expect(err?.cause).toBe(cause);
    });

    test('resolves a throwing transport as NetworkError', async () => {
      const client = createClient();
      transport.get.mockRejectedValueOnce(new TypeError('boom'));

      const [err] = await client.send(client.get(posts, 'a1'));

      expect(err).toBeInstanceOf(NetworkError);
      expect(err?.cause).toHaveProperty('message', 'error calling transport GET');
    });

    test('passes the caller signal to the transport', async () => {
      const client = createClient();
      const controller = new AbortController();
      transport.get.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }));

      await client.send(client.get(posts, 'a1'), { signal: controller.signal });

      const options: FetchOptions | undefined = transport.get.mock.calls[0]?.[1];
      expect(options?.signal).toBe(controller.signal);
    });

    test('surfaces aborts as NetworkError with the abort in the cause chain', async () => {
      const client = createClient();
      const controller = new AbortController();
      transport.get.mockImplementationOnce(
        (_url, opts) =>
          new Promise((resolve) => {
            opts.signal?.addEventListener('abort', () =>
              resolve([new Error('error wrapping GET request in fetchClient', { cause: opts.signal?.reason }), null]),
            );
          }),
      );

      const pending = client.send(client.get(posts, 'a1'), { signal: controller.signal });
      controller.abort();
      const [err] = await pending;

      expect(err).toBeInstanceOf(NetworkError);
      expect(isAbortError(err)).toBe(true);
    });

    test('times out with the client default timeout', async () => {
      vi.useFakeTimers();
      const client = createClient({ fetchOpts: { timeout: 50 } });
      transport.get.mockImplementationOnce(
        (_url, opts) =>
          new Promise((resolve) => {
            opts.signal?.addEventListener('abort', () =>
              resolve([new Error('error wrapping GET request in fetchClient', { cause: opts.signal?.reason }), null]),
            );
          }),
      );

      const pending = client.send(client.get(posts, 'a1'));
      await vi.advanceTimersByTimeAsync(50);
      const [err] = await pending;

      expect(err).toBeInstanceOf(NetworkError);
      expect(isTimeoutError(err)).toBe(true);
    });

    test('stops the timeout timer once the response is read', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const client = createClient({ fetchOpts: { timeout: 5000 } });
      transport.get.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }));

      const [err] = await client.send(client.get(posts, 'a1'));

      expect(err).toBeNull();
      expect(vi.getTimerCount()).toBe(0);
    });

    test('a per-send timeout of false disables the default', async () => {
      const client = createClient({ fetchOpts: { timeout: 50 } });
      transport.get.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }));

      await client.send(client.get(posts, 'a1'), { timeout: false });

      expect(transport.get.mock.calls[0]?.[1]).not.toHaveProperty('signal');
    });

    test('walks every page of a list', async () => {
      const client = createClient();
      transport.get
        .mockResolvedValueOnce(
          json(
            { data: [{ id: 'a1', title: 'First' }] },
            { status: 200, headers: { 'Total-Records': '2', 'Next-Page': `${RECORDS}?_limit=1&_token=page2` } },
          ),
        )
        .mockResolvedValueOnce(
          json({ data: [{ id: 'a2', title: 'Second' }] }, { status: 200, headers: { 'Total-Records': '2' } }),
        );

      const [errFirst, first] = await client.send(limit(client.getList(posts), 1));
      expect(errFirst).toBeNull();
      if (!first) {
        return;
      }

      let pager = first;
      for (let request = loadNextPage(pager); request; request = loadNextPage(pager)) {
        const [err, next] = await client.send(request);
        expect(err).toBeNull();
        if (!next) {
          return;
        }
        pager = mergePager(pager, next);
      }

      expect(pager.objects.map((post) => post.id)).toEqual(['a1', 'a2']);
      expect(pager.total).toBe(2);
      expect(pager.nextPage).toBeNull();
      expect(transport.get.mock.calls.map(([url]) => url)).toEqual([
        `${RECORDS}?_limit=1`,
        `${RECORDS}?_limit=1&_token=page2`,
      ]);
    });
  });

  describe('logging', () => {
    function captureLogger() {
      const lines: unknown[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(JSON.parse(line)) });
      return { lines, logger };
    }

    test('logs dispatch and success at debug', async () => {
      const { lines, logger } = captureLogger();
      const client = createClient({ logger });
      transport.get.mockResolvedValueOnce(json({ data: { id: 'a1', title: 'Hello' } }));

      await client.send(client.get(posts, 'a1'));

      expect(lines).toEqual([
        expect.objectContaining({ level: 20, msg: 'sending request', method: 'get', url: `${RECORDS}/a1` }),
        expect.objectContaining({ level: 20, msg: 'request succeeded', status: 200, url: `${RECORDS}/a1` }),
      ]);
    });

    test('logs transport failures at warn', async () => {
      const { lines, logger } = captureLogger();
      const client = createClient({ logger });
      transport.get.mockResolvedValueOnce([new Error('error wrapping GET request in fetchClient'), null]);

      await client.send(client.get(posts, 'a1'));

      expect(lines[1]).toEqual(expect.objectContaining({ level: 40, msg: 'request failed before a response' }));
    });

    test('logs error responses at debug', async () => {
      const { lines, logger } = captureLogger();
      const client = createClient({ logger });
      transport.get.mockResolvedValueOnce(
        json({ errno: 111, message: 'Resource not found', code: 404, error: 'Not Found' }, { status: 404 }),
      );

      await client.send(client.get(posts, 'missing'));

      expect(lines[1]).toEqual(expect.objectContaining({ level: 20, msg: 'request returned an error', status: 404 }));
    });
  });
});
