import type { Header, HeaderOptions } from '../types/request.js';

/** One step of a header merge: set `name` to `value`, or drop it when `value` is `null`. */
type HeaderEdit = readonly [name: string, value: string | null];

function isHeaderList(headers: HeaderOptions): headers is readonly Header[] {
  return Array.isArray(headers);
}

function toEdits(headers: HeaderOptions | undefined): readonly HeaderEdit[] {
  if (!headers) {
    return [];
  }

  if (isHeaderList(headers)) {
    return headers;
  }

  return Object.entries(headers).map(([name, value]): HeaderEdit => [name, value ?? null]);
}

/**
 * Folds header layers into one ordered list of {@link Header} pairs.
 *
 * Names compare case-insensitively. A later layer replaces the value in place and
 * keeps the spelling it was given; a `null` or `undefined` record value drops the
 * header. Empty values are kept, so the empty `Authorization` of an anonymous
 * client is still sent.
 *
 * @example
 * mergeHeaders([['Authorization', '']], { Accept: 'application/json' });
 * // [['Authorization', ''], ['Accept', 'application/json']]
 */
export function mergeHeaders(...layers: ReadonlyArray<HeaderOptions | undefined>): Header[] {
  const merged = new Map<string, Header>();

  for (const [name, value] of layers.flatMap((layer) => toEdits(layer))) {
    const key = name.toLowerCase();
    if (value === null) {
      merged.delete(key);
      continue;
    }

    merged.set(key, [name, value]);
  }

  return [...merged.values()];
}

/**
 * Copies header pairs into the mutable tuples `fetch` accepts.
 */
export function toHeadersInit(headers: readonly Header[]): [string, string][] {
  return headers.map(([name, value]): [string, string] => [name, value]);
}
