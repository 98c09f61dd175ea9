/**
 * Centralized configuration constants for the fsmonitor bridge
 */

/**
 * Protocol Configuration
 */
export const PROTOCOL_CONSTANTS = {
  /** Lowest protocol version the bridge speaks */
  MIN_VERSION: 1,

  /** Highest protocol version the bridge speaks; announced at startup */
  MAX_VERSION: 1,
} as const;

/**
 * Change Coalescing Configuration
 */
export const WATCHER_CONSTANTS = {
  /** Quiescence window before a batch of changes is signalled */
  DEFAULT_DEBOUNCE_MS: 50,

  /** Minimum debounce interval in milliseconds */
  MIN_DEBOUNCE_MS: 0,

  /** Longest a batch may stay unsignalled while events keep arriving, from its first record */
  MAX_BATCH_DELAY_MS: 500,
} as const;

/**
 * Subscription retry Configuration
 */
export const RETRY_CONSTANTS = {
  /** Attempts before a root is degraded to failed */
  MAX_ATTEMPTS: 5,

  /** Delay before the first retry */
  BASE_DELAY_MS: 100,

  BACKOFF_FACTOR: 2,

  /** Cap on a single retry delay */
  MAX_DELAY_MS: 5_000,
} as const;

export const CONFIG_FILE_NAME = 'fsmonitor.json';
