import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { Timeout } from '../types/timeout.js';

/** A timeout signal and the function that stops its timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer; call once the guarded work has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * the specified timeout.
 *
 * When `timeoutMs` is `false`, `0` or omitted, no timeout signal is created.
 * The pending timer keeps the process alive until it fires or `clear` is called.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The signal with its `clear` function, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout: Timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals: `null`.
 * - One signal: returned as-is.
 * - Several: a new signal aborting when any source aborts, with the source's
 *   `reason`, or an {@link AbortError} when the source has none.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 */
export function mergeSignals(signals: ReadonlyArray<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s != null);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0] ?? null;
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of listeners) {
        remove();
      }
    },
    { once: true },
  );

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}
