import { safeWrap } from './wrap.js';

/** A single query parameter as a `[key, value]` pair, both unescaped. */
export type QueryParam = readonly [key: string, value: string];

/**
 * Escapes one query component the way Kinto expects: `encodeURIComponent`
 * with spaces written as `+`.
 */
function encodeComponent(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, '+');
}

/**
 * Unescapes one query component, reading `+` as a space.
 * Returns `null` when the component holds a malformed percent-escape.
 */
function decodeComponent(value: string): string | null {
  const [err, decoded] = safeWrap(() => decodeURIComponent(value.replace(/\+/g, ' ')));
  return err ? null : decoded;
}

/**
 * Splits a query string (without the leading `?`) into unescaped pairs.
 *
 * Pairs that do not split into exactly one key and one value on `=`, or whose
 * escapes cannot be decoded, are dropped.
 */
export function parseQuery(query: string): QueryParam[] {
  const params: QueryParam[] = [];

  for (const entry of query.split('&')) {
    const parts = entry.split('=');
    if (parts.length !== 2) {
      continue;
    }

    const [rawKey = '', rawValue = ''] = parts;
    const key = decodeComponent(rawKey);
    const value = decodeComponent(rawValue);
    if (key === null || value === null) {
      continue;
    }

    params.push([key, value]);
  }

  return params;
}

/**
 * Serializes pairs into a query string (without the leading `?`).
 */
export function stringifyQuery(params: readonly QueryParam[]): string {
  return params.map(([key, value]) => `${encodeComponent(key)}=${encodeComponent(value)}`).join('&');
}

/**
 * Appends one query parameter to a URL, keeping every parameter already on it.
 *
 * The URL is split on its first `?`; the existing pairs are re-encoded together with
 * the new one, which is appended last. Duplicate keys are kept.
 *
 * @example
 * appendQueryParam('https://kinto.example.com/v1/buckets?_limit=10', '_sort', '-last_modified');
 * // 'https://kinto.example.com/v1/buckets?_limit=10&_sort=-last_modified'
 */
export function appendQueryParam(url: string, key: string, value: string): string {
  const separator = url.indexOf('?');
  const base = separator === -1 ? url : url.slice(0, separator);
  const query = separator === -1 ? '' : url.slice(separator + 1);

  return `${base}?${stringifyQuery([...parseQuery(query), [key, value]])}`;
}

/**
 * Returns a copy of `request` with one more query parameter on its URL.
 *
 * Works on anything carrying a `url`, so modifiers compose in any order.
 */
export function addParam<Request extends { readonly url: string }>(
  request: Request,
  key: string,
  value: string,
): Request {
  return { ...request, url: appendQueryParam(request.url, key, value) };
}
