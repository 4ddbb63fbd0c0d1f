import { type Logger, pino } from 'pino';

export type { Logger };

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'KINTO_LOG_LEVEL';

/** Level names pino accepts out of the box. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Creates the logger used when `KintoClient` is not given one.
 *
 * The level comes from `level`, then from `KINTO_LOG_LEVEL`, and is `silent` otherwise,
 * so a library consumer sees nothing unless they ask for it. Unknown levels fall back to `silent`.
 */
export function createLogger(level?: string): Logger {
  const requested = level ?? globalThis.process?.env?.[LOG_LEVEL_ENV];

  return pino({
    name: 'kinto-typed',
    level: isLevel(requested) ? requested : 'silent',
  });
}
