import type { Header } from '../types/request.js';
import type { Auth } from './types.js';

/** Name of the header carrying credentials. */
export const AUTHORIZATION = 'Authorization';

/**
 * Formats credentials as the `Authorization` header.
 *
 * - `none`: empty value
 * - `basic`: `Basic base64(username:password)`, over the UTF-8 bytes
 * - `bearer`: `Bearer token`
 * - `custom`: `realm token`, e.g. for an OpenID provider registered under its own realm
 */
export function headersForAuth(auth: Auth): Header {
  switch (auth.type) {
    case 'none':
      return [AUTHORIZATION, ''];
    case 'basic':
      return [AUTHORIZATION, `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`];
    case 'bearer':
      return [AUTHORIZATION, `Bearer ${auth.token}`];
    case 'custom':
      return [AUTHORIZATION, `${auth.realm} ${auth.token}`];
  }
}
