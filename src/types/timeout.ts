/** Timeout handle used by the signal utilities. */
export type Timeout = ReturnType<typeof setTimeout> | undefined;
