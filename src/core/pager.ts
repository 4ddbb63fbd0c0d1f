import { safeWrap } from '../utils/wrap.js';
import { expectPager } from './response.js';
import type { Client, Pager, PendingRequest, Resource } from './types.js';

/**
 * A pager with nothing fetched yet, to fold the first page into.
 */
export function emptyPager<T>(client: Client, resource: Resource<T>): Pager<T> {
  return {
    client,
    objects: [],
    decoder: resource.listDecoder,
    total: 0,
    nextPage: null,
  };
}

/**
 * Folds a freshly fetched page into the pager accumulated so far.
 *
 * Objects are appended in order; `total` and `nextPage` come from `next`;
 * `client` and `decoder` stay those of `previous`.
 */
export function mergePager<T>(previous: Pager<T>, next: Pager<T>): Pager<T> {
  return {
    ...previous,
    objects: [...previous.objects, ...next.objects],
    total: next.total,
    nextPage: next.nextPage,
  };
}

/**
 * Resolves a relative `next-page` value against an absolute base URL. Absolute
 * values, and any value that cannot be resolved (a same-origin base such as `/v1`),
 * are used verbatim.
 */
function resolveNextPage(baseUrl: string, nextPage: string): string {
  if (/^[a-z][a-z\d+\-.]*:/i.test(nextPage)) {
    return nextPage;
  }

  const [errUrl, url] = safeWrap(() => new URL(nextPage, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`));
  return errUrl ? nextPage : url.toString();
}

/**
 * Request for the page after the last one fetched, or `null` when there is none.
 *
 * The URL is the server-provided `next-page` (already carrying every query
 * parameter); the result is a new pager holding only that page, to be folded in
 * with {@link mergePager}.
 *
 * @example
 * let pager = first;
 * for (let request = loadNextPage(pager); request; request = loadNextPage(pager)) {
 *   const [err, page] = await client.send(request);
 *   if (err) break;
 *   pager = mergePager(pager, page);
 * }
 */
export function loadNextPage<T>(pager: Pager<T>): PendingRequest<Pager<T>> | null {
  if (pager.nextPage === null) {
    return null;
  }

  return {
    method: 'get',
    url: resolveNextPage(pager.client.baseUrl, pager.nextPage),
    headers: pager.client.headers,
    body: null,
    expect: expectPager(pager.client, pager.decoder),
  };
}
