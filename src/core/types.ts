import type { KintoRequestError } from '../error/errorToString.js';
import type { FetchResponse, Header, HttpMethod } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Bucket identifier. */
export type BucketName = string;
/** Collection identifier, unique within its bucket. */
export type CollectionName = string;
/** Record (or bucket / collection) identifier used by item endpoints. */
export type ItemId = string;

/**
 * Every endpoint of the API, one variant per URL template.
 * Identifiers are used in the path as given, without escaping.
 */
export type Endpoint =
  | { type: 'root' }
  | { type: 'bucketList' }
  | { type: 'bucket'; bucket: BucketName }
  | { type: 'collectionList'; bucket: BucketName }
  | { type: 'collection'; bucket: BucketName; collection: CollectionName }
  | { type: 'recordList'; bucket: BucketName; collection: CollectionName }
  | { type: 'record'; bucket: BucketName; collection: CollectionName; id: ItemId };

/** Filters with a field name and one operand. */
type FieldFilter = {
  type: 'equal' | 'min' | 'max' | 'lt' | 'gt' | 'not' | 'like';
  field: string;
  value: string;
};

/**
 * Record filters, each translated to one query parameter.
 * `since` and `before` compare against the record timestamp (`last_modified`).
 */
export type Filter =
  | FieldFilter
  | { type: 'in'; field: string; values: readonly string[] }
  | { type: 'since'; value: string }
  | { type: 'before'; value: string };

/** Credentials rendered into the `Authorization` header. */
export type Auth =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string }
  | { type: 'custom'; realm: string; token: string };

/**
 * Turns parsed JSON into a typed value, or an error explaining why it could not.
 */
export type Decoder<T> = (json: unknown) => SafeWrapAsync<Error, T>;

/**
 * Item and list endpoints of one kind of object, with the decoders for their payloads.
 */
export interface Resource<T> {
  readonly itemEndpoint: (id: ItemId) => Endpoint;
  readonly listEndpoint: Endpoint;
  readonly itemDecoder: Decoder<T>;
  readonly listDecoder: Decoder<T[]>;
}

/**
 * Connection data a request is built from: where the server lives and the headers
 * sent with every request. Always holds exactly one `Authorization` header.
 */
export interface Client {
  readonly baseUrl: string;
  readonly headers: readonly Header[];
}

/**
 * Accumulated results of a paginated list endpoint.
 *
 * `objects` holds every fetched object in page-arrival order; `total` and `nextPage`
 * reflect the most recent page only.
 */
export interface Pager<T> {
  readonly client: Client;
  readonly objects: readonly T[];
  readonly decoder: Decoder<T[]>;
  /** Total number of objects the server reported, `0` when it did not say. */
  readonly total: number;
  /** URL of the next page, `null` when the last fetch was the final page. */
  readonly nextPage: string | null;
}

/**
 * Turns the outcome of one dispatch (the transport error or the response) into the
 * request's typed result.
 */
export type ResponseInterpreter<T> = (
  outcome: SafeWrap<Error, FetchResponse>,
) => SafeWrapAsync<KintoRequestError, T>;

/**
 * Immutable description of one outbound request and how to read its response.
 * Modifiers return new values; nothing is sent until it is handed to a transport.
 */
export interface PendingRequest<T> {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: readonly Header[];
  /** Serialized JSON body, `null` for requests without one. */
  readonly body: string | null;
  readonly expect: ResponseInterpreter<T>;
}
