import { addParam } from '../utils/queryParams.js';
import type { Filter, PendingRequest } from './types.js';

/**
 * Query parameter `[key, value]` for a filter.
 *
 * | filter   | key          |
 * | -------- | ------------ |
 * | `equal`  | `field`      |
 * | `min`    | `min_field`  |
 * | `max`    | `max_field`  |
 * | `lt`     | `lt_field`   |
 * | `gt`     | `gt_field`   |
 * | `in`     | `in_field`   |
 * | `not`    | `not_field`  |
 * | `like`   | `like_field` |
 * | `since`  | `_since`     |
 * | `before` | `_before`    |
 */
export function filterParam(filter: Filter): readonly [key: string, value: string] {
  switch (filter.type) {
    case 'equal':
      return [filter.field, filter.value];
    case 'min':
    case 'max':
    case 'lt':
    case 'gt':
    case 'not':
    case 'like':
      return [`${filter.type}_${filter.field}`, filter.value];
    case 'in':
      return [`in_${filter.field}`, filter.values.join(',')];
    case 'since':
      return ['_since', filter.value];
    case 'before':
      return ['_before', filter.value];
  }
}

/**
 * Narrows a list request with a filter.
 *
 * @example
 * filter(client.getList(posts), { type: 'in', field: 'status', values: ['draft', 'review'] });
 * // ...?in_status=draft%2Creview
 */
export function filter<T>(request: PendingRequest<T>, f: Filter): PendingRequest<T> {
  const [key, value] = filterParam(f);
  return addParam(request, key, value);
}

/**
 * Orders a list request by the given keys; prefix a key with `-` for descending order.
 */
export function sort<T>(request: PendingRequest<T>, keys: readonly string[]): PendingRequest<T> {
  return addParam(request, '_sort', keys.join(','));
}

/**
 * Caps the number of objects per page.
 */
export function limit<T>(request: PendingRequest<T>, n: number): PendingRequest<T> {
  return addParam(request, '_limit', String(n));
}
