import type { Endpoint } from './types.js';

/**
 * Path segments of an endpoint, relative to the base URL.
 */
function segments(endpoint: Endpoint): string[] {
  switch (endpoint.type) {
    case 'root':
      return [];
    case 'bucketList':
      return ['buckets'];
    case 'bucket':
      return ['buckets', endpoint.bucket];
    case 'collectionList':
      return ['buckets', endpoint.bucket, 'collections'];
    case 'collection':
      return ['buckets', endpoint.bucket, 'collections', endpoint.collection];
    case 'recordList':
      return ['buckets', endpoint.bucket, 'collections', endpoint.collection, 'records'];
    case 'record':
      return ['buckets', endpoint.bucket, 'collections', endpoint.collection, 'records', endpoint.id];
  }
}

/**
 * Resolves an endpoint to its absolute URL.
 *
 * One trailing `/` is stripped from `baseUrl`. The root endpoint ends with `/`
 * (the server redirects the bare URL); no other endpoint does.
 *
 * @example
 * endpointUrl('https://kinto.example.com/v1/', { type: 'collection', bucket: 'blog', collection: 'posts' });
 * // 'https://kinto.example.com/v1/buckets/blog/collections/posts'
 */
export function endpointUrl(baseUrl: string, endpoint: Endpoint): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (endpoint.type === 'root') {
    return `${base}/`;
  }

  return [base, ...segments(endpoint)].join('/');
}
