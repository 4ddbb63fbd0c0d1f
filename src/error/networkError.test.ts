import { describe, expect, it } from 'vitest';
import { getNetworkError, isNetworkError, NetworkError } from './networkError.js';

describe('NetworkError', () => {
  it('keeps the transport failure as cause and has no response by default', () => {
    const cause = new TypeError('fetch failed');
    const err = new NetworkError('error sending request', { cause });

    expect(err.message).toEqual('error sending request');
    expect(err.cause).toBe(cause);
    expect(err.response).toBeNull();
  });

  it('keeps the response whose body failed to read', () => {
    const response = new Response('{}', { status: 200 });
    const err = new NetworkError('error receiving response', { response });

    expect(err.response).toBe(response);
  });

  it('is found through its guard and extractor', () => {
    const err = new NetworkError('error sending request');
    const wrapped = new Error('error syncing', { cause: err });

    expect(isNetworkError(wrapped)).toEqual(true);
    expect(getNetworkError(wrapped)).toBe(err);
    expect(isNetworkError(new Error('error syncing'))).toEqual(false);
  });
});
