/**
 * Root entrypoint for kinto-typed: re-exports the client, resources, modifiers, pagination,
 * transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export * from './fetch/index.js';

/**
 * Transport contract, header and per-dispatch option types.
 */
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  Header,
  HeaderOptions,
  HttpMethod,
  SendOptions,
} from './types/request.js';

/** Query-string helpers used by the modifiers. */
export { addParam, appendQueryParam, parseQuery, type QueryParam, stringifyQuery } from './utils/queryParams.js';

/** Pino logger factory and the environment variable it reads. */
export { createLogger, LOG_LEVEL_ENV, type Logger, type LogLevel } from './utils/logger.js';

/** Error-first result tuples. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
