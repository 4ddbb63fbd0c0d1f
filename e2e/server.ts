import { type ServerType, serve } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { z } from 'zod';
import { validator } from '../src/utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  /** Base URL including the API version, e.g. `http://127.0.0.1:1234/v1` */
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  /** While on, every API request is answered by an HTML 503 page */
  setOutage: (outage: boolean) => void;
  /** Delays every API response by `ms` */
  setDelay: (ms: number) => void;
  getCounts: () => Record<string, number>;
};

export const E2E_USER = 'e2e-user';
export const E2E_PASSWORD = 'test-secret';

type StoredObject = Record<string, unknown> & { id: string; last_modified: number };

const API = '/v1';
const FIRST_TIMESTAMP = 1700000000000;
const LIST_PARAMS = new Set(['_sort', '_limit', '_token']);

const bodySchema = z.object({ data: z.record(z.string(), z.unknown()).optional() });

function json(body: unknown, status: number, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function kintoError(status: number, errno: number, error: string, message: string): Response {
  return json({ code: status, errno, error, message }, status);
}

function notFound(): Response {
  return kintoError(404, 111, 'Not Found', 'The resource you are looking for could not be found.');
}

function compare(value: unknown, operand: string): number {
  if (typeof value === 'number') {
    return value - Number(operand);
  }

  return String(value).localeCompare(operand);
}

function matches(object: StoredObject, key: string, operand: string): boolean {
  const [prefix, ...rest] = key.split('_');
  const field = rest.join('_');

  switch (`${prefix}_`) {
    case '_':
      if (field === 'since') {
        return object.last_modified > Number(operand);
      }
      if (field === 'before') {
        return object.last_modified < Number(operand);
      }
      return true;
    case 'min_':
      return compare(object[field], operand) >= 0;
    case 'max_':
      return compare(object[field], operand) <= 0;
    case 'lt_':
      return compare(object[field], operand) < 0;
    case 'gt_':
      return compare(object[field], operand) > 0;
    case 'in_':
      return operand.split(',').includes(String(object[field]));
    case 'not_':
      return String(object[field]) !== operand;
    case 'like_':
      return String(object[field]).includes(operand.replace(/\*/g, ''));
    default:
      return String(object[key]) === operand;
  }
}

function sortBy(objects: StoredObject[], keys: string | null): StoredObject[] {
  if (!keys) {
    return objects;
  }

  return [...objects].sort((a, b) => {
    for (const key of keys.split(',')) {
      const descending = key.startsWith('-');
      const field = descending ? key.slice(1) : key;
      const order = compare(a[field], String(b[field]));
      if (order !== 0) {
        return descending ? -order : order;
      }
    }

    return 0;
  });
}

export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const counts: Record<string, number> = {};
  // Objects keyed by their list path, e.g. `/buckets/blog/collections`
  const store = new Map<string, Map<string, StoredObject>>();
  const expectedAuth = `Basic ${Buffer.from(`${E2E_USER}:${E2E_PASSWORD}`).toString('base64')}`;
  let clock = FIRST_TIMESTAMP;
  let generated = 0;
  let outage = false;
  let delay = 0;
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  function listOf(listKey: string): Map<string, StoredObject> {
    const existing = store.get(listKey);
    if (existing) {
      return existing;
    }

    const created = new Map<string, StoredObject>();
    store.set(listKey, created);
    return created;
  }

  function parentExists(listKey: string): boolean {
    const segments = listKey.split('/');
    if (segments.length <= 2) {
      return true;
    }

    const parentList = segments.slice(0, -2).join('/');
    const parentId = segments[segments.length - 2] ?? '';
    return (store.get(parentList)?.has(parentId) ?? false) && parentExists(parentList);
  }

  function listKeyOf(c: Context): string {
    return c.req.path.slice(API.length);
  }

  function itemOf(c: Context): [listKey: string, id: string] {
    const path = listKeyOf(c);
    const separator = path.lastIndexOf('/');
    return [path.slice(0, separator), path.slice(separator + 1)];
  }

  async function readData(c: Context): SafeWrapAsync<Response, Record<string, unknown>> {
    const [errJson, body] = await safeWrapAsync(() => c.req.json<unknown>());
    if (errJson) {
      return [kintoError(400, 106, 'Bad Request', 'Invalid JSON'), null];
    }

    const [errBody, parsed] = await validator(body, bodySchema);
    if (errBody) {
      return [kintoError(400, 107, 'Invalid parameters', errBody.message), null];
    }

    return [null, parsed.data ?? {}];
  }

  function write(listKey: string, id: string, data: Record<string, unknown>): StoredObject {
    clock += 1;
    const object: StoredObject = { ...data, id, last_modified: clock };
    listOf(listKey).set(id, object);
    return object;
  }

  app.use(`${API}/*`, async (c, next) => {
    increment(`${c.req.method} ${c.req.path}`);

    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    if (outage) {
      return c.html('<html><body>Service Unavailable</body></html>', 503);
    }

    if (c.req.header('authorization') !== expectedAuth) {
      return kintoError(401, 104, 'Unauthorized', 'Please authenticate yourself to use this endpoint.');
    }

    await next();
  });

  for (const list of [
    `${API}/buckets`,
    `${API}/buckets/:bucket/collections`,
    `${API}/buckets/:bucket/collections/:collection/records`,
  ]) {
    app.get(list, (c) => {
      const listKey = listKeyOf(c);
      if (!parentExists(listKey)) {
        return notFound();
      }

      const url = new URL(c.req.url);
      const filtered = [...listOf(listKey).values()].filter((object) =>
        [...url.searchParams].every(([key, value]) => LIST_PARAMS.has(key) || matches(object, key, value)),
      );
      const sorted = sortBy(filtered, url.searchParams.get('_sort'));
      const offset = Number(url.searchParams.get('_token') ?? '0');
      const limit = Number(url.searchParams.get('_limit') ?? String(sorted.length));
      const headers: Record<string, string> = { 'Total-Records': String(sorted.length) };

      if (offset + limit < sorted.length) {
        const next = new URL(url);
        next.searchParams.set('_token', String(offset + limit));
        headers['Next-Page'] = next.toString();
      }

      return json({ data: sorted.slice(offset, offset + limit) }, 200, headers);
    });

    app.post(list, async (c) => {
      const listKey = listKeyOf(c);
      if (!parentExists(listKey)) {
        return notFound();
      }

      const [errData, data] = await readData(c);
      if (errData) {
        return errData;
      }

      const existing = typeof data.id === 'string' ? listOf(listKey).get(data.id) : undefined;
      if (existing) {
        return json({ data: existing }, 200);
      }

      generated += 1;
      const id = typeof data.id === 'string' ? data.id : `r${generated}`;
      return json({ data: write(listKey, id, data) }, 201);
    });

    const item = `${list}/:id`;

    app.get(item, (c) => {
      const [listKey, id] = itemOf(c);
      const object = listOf(listKey).get(id);
      return object ? json({ data: object }, 200) : notFound();
    });

    app.put(item, async (c) => {
      const [listKey, id] = itemOf(c);
      if (!parentExists(listKey)) {
        return notFound();
      }

      const [errData, data] = await readData(c);
      if (errData) {
        return errData;
      }

      const created = !listOf(listKey).has(id);
      return json({ data: write(listKey, id, data) }, created ? 201 : 200);
    });

    app.patch(item, async (c) => {
      const [listKey, id] = itemOf(c);
      const existing = listOf(listKey).get(id);
      if (!existing) {
        return notFound();
      }

      const [errData, data] = await readData(c);
      if (errData) {
        return errData;
      }

      return json({ data: write(listKey, id, { ...existing, ...data }) }, 200);
    });

    app.delete(item, (c) => {
      const [listKey, id] = itemOf(c);
      if (!listOf(listKey).delete(id)) {
        return notFound();
      }

      for (const key of [...store.keys()]) {
        if (key.startsWith(`${listKey}/${id}/`)) {
          store.delete(key);
        }
      }

      clock += 1;
      return json({ data: { id, last_modified: clock, deleted: true } }, 200);
    });
  }

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  let [server, port] = serverAndPort;
  const address = server.address();
  if (address && typeof address !== 'string') {
    port = address.port;
  }

  return [
    null,
    {
      url: `http://127.0.0.1:${port}${API}`,
      reset: () => {
        for (const k of Object.keys(counts)) {
          delete counts[k];
        }
        store.clear();
        clock = FIRST_TIMESTAMP;
        generated = 0;
        outage = false;
        delay = 0;
      },
      setOutage: (value) => {
        outage = value;
      },
      setDelay: (ms) => {
        delay = ms;
      },
      getCounts: () => structuredClone(counts),
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
