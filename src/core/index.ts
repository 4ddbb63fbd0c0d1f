/**
 * Core entrypoint: exports the Kinto client, resource descriptors, modifiers and pagination.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor options accepted by {@link KintoClient}.
 */
export type { KintoClientProps } from './client.js';

/**
 * Client for a Kinto server that:
 * - builds immutable requests against bucket, collection and record endpoints,
 * - dispatches them through a pluggable transport,
 * - interprets responses into typed values, pagers or request errors.
 *
 * `send` resolves with error-first `[error, data]` tuples and never rejects.
 */
export { KintoClient } from './client.js';

/** Authorization header formatting. */
export { AUTHORIZATION, headersForAuth } from './auth.js';
/** URL for an endpoint relative to a base URL. */
export { endpointUrl } from './endpoint.js';
/** Query modifiers for list requests. */
export { filter, filterParam, limit, sort } from './modifiers.js';
/** Pagination helpers. */
export { emptyPager, loadNextPage, mergePager } from './pager.js';
/** Resource descriptors and the `{ "data": ... }` envelope codecs. */
export {
  bucketResource,
  collectionResource,
  createResource,
  decodeData,
  decodeDataList,
  encodeData,
  recordResource,
} from './resource.js';
/** Response interpreters and the pagination header names they read. */
export { expectJson, expectPager, NEXT_PAGE_HEADER, parseTotal, TOTAL_RECORDS_HEADER } from './response.js';

/**
 * Data model of requests, resources and pagers.
 */
export type {
  Auth,
  BucketName,
  Client,
  CollectionName,
  Decoder,
  Endpoint,
  Filter,
  ItemId,
  Pager,
  PendingRequest,
  Resource,
  ResponseInterpreter,
} from './types.js';

