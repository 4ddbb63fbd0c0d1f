import type { StandardSchemaV1 } from '@standard-schema/spec';
import { validator } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { BucketName, CollectionName, Decoder, Endpoint, ItemId, Resource } from './types.js';

/**
 * Reads the `data` member of the `{ "data": ... }` envelope.
 */
function unwrapEnvelope(json: unknown): SafeWrap<Error, unknown> {
  if (typeof json !== 'object' || json === null || Array.isArray(json) || !('data' in json)) {
    return [new Error('error expected an object with a "data" field'), null];
  }

  return [null, json.data];
}

/**
 * Builds a decoder for `{ "data": <object> }` payloads from a schema for one object.
 *
 * Any Standard Schema works (zod, valibot, arktype, ...), sync or async.
 *
 * @example
 * const decodePost = decodeData(z.object({ id: z.string(), title: z.string() }));
 * const [err, post] = await decodePost({ data: { id: 'a1', title: 'Hello' } });
 */
export function decodeData<Schema extends StandardSchemaV1>(
  schema: Schema,
): Decoder<StandardSchemaV1.InferOutput<Schema>> {
  return async (json) => {
    const [errEnvelope, data] = unwrapEnvelope(json);
    if (errEnvelope) {
      return [errEnvelope, null];
    }

    const [errValidate, value] = await validator(data, schema);
    if (errValidate) {
      return [new Error('error decoding data', { cause: errValidate }), null];
    }

    return [null, value];
  };
}

/**
 * Builds a decoder for `{ "data": [<object>, ...] }` payloads from a schema for one object.
 *
 * Objects are validated in order; the first failure is reported with its index.
 */
export function decodeDataList<Schema extends StandardSchemaV1>(
  schema: Schema,
): Decoder<StandardSchemaV1.InferOutput<Schema>[]> {
  return async (json) => {
    const [errEnvelope, data] = unwrapEnvelope(json);
    if (errEnvelope) {
      return [errEnvelope, null];
    }

    if (!Array.isArray(data)) {
      return [new Error('error expected "data" to be a list'), null];
    }

    const values: StandardSchemaV1.InferOutput<Schema>[] = [];
    for (const [index, item] of data.entries()) {
      const [errValidate, value] = await validator(item, schema);
      if (errValidate) {
        return [new Error(`error decoding data[${index}]`, { cause: errValidate }), null];
      }

      values.push(value);
    }

    return [null, values];
  };
}

/**
 * Serializes a payload inside the `{ "data": ... }` envelope used for writes.
 */
export function encodeData(payload: unknown): string {
  return JSON.stringify({ data: payload });
}

/**
 * Binds an item/list endpoint pair to the decoders built from `schema`.
 */
export function createResource<Schema extends StandardSchemaV1>(
  itemEndpoint: (id: ItemId) => Endpoint,
  listEndpoint: Endpoint,
  schema: Schema,
): Resource<StandardSchemaV1.InferOutput<Schema>> {
  return {
    itemEndpoint,
    listEndpoint,
    itemDecoder: decodeData(schema),
    listDecoder: decodeDataList(schema),
  };
}

/**
 * Resource for buckets.
 */
export function bucketResource<Schema extends StandardSchemaV1>(
  schema: Schema,
): Resource<StandardSchemaV1.InferOutput<Schema>> {
  return createResource((id) => ({ type: 'bucket', bucket: id }), { type: 'bucketList' }, schema);
}

/**
 * Resource for the collections of one bucket.
 */
export function collectionResource<Schema extends StandardSchemaV1>(
  bucket: BucketName,
  schema: Schema,
): Resource<StandardSchemaV1.InferOutput<Schema>> {
  return createResource(
    (id) => ({ type: 'collection', bucket, collection: id }),
    { type: 'collectionList', bucket },
    schema,
  );
}

/**
 * Resource for the records of one collection.
 *
 * @example
 * const posts = recordResource('blog', 'posts', z.object({ id: z.string(), title: z.string() }));
 */
export function recordResource<Schema extends StandardSchemaV1>(
  bucket: BucketName,
  collection: CollectionName,
  schema: Schema,
): Resource<StandardSchemaV1.InferOutput<Schema>> {
  return createResource(
    (id) => ({ type: 'record', bucket, collection, id }),
    { type: 'recordList', bucket, collection },
    schema,
  );
}
