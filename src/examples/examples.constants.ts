export const EXAMPLES_DEFAULTS = {
  CLOCK_INTERVAL_MS: 1000,
  DEFERRED_DELAY_MS: 2000,
  APPEND_INTERVAL_MS: 3000,
  /** The feed stops itself after this many rows */
  APPEND_MAX_ENTRIES: 10,
} as const;
