import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Safely reads the response body as text into a tuple-style result.
 *
 * Behavior:
 * - Status 204 and 205 carry no body in HTTP; they resolve to `[null, '']`
 *   without touching the stream.
 * - Otherwise the body is read once with `response.text()`; a failure while reading
 *   resolves to `[Error, null]` with the original error as `cause`.
 *
 * The raw text is returned unparsed: callers need it verbatim for diagnostics.
 */
export async function readResponseBody(response: FetchResponse): SafeWrapAsync<Error, string> {
  if (response.status === 204 || response.status === 205) {
    return [null, ''];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body', { cause: errText }), null];
  }

  return [null, text];
}
