/**
 * Fetch entrypoint: exports the default transport and its options.
 * @module
 */
export { FetchClient, type FetchClientOptions } from './client.js';
export { mergeHeaders, toHeadersInit } from './utils.js';
