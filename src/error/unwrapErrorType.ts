/** Constructor of any `Error` subclass, whatever its constructor arguments are. */
// biome-ignore lint/suspicious/noExplicitAny: errorClass needs to accept any constructor signature
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * An error matches when it is an instance of `errorClass` or carries the same `name`.
 * Messages are never inspected: they may hold text sent by the server.
 * With `shallow` only the outermost error is inspected. Cyclic cause chains stop at
 * the first repeated error.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass || current.name === errorClass.name) {
      return current as T;
    }

    if (shallow) {
      return null;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
