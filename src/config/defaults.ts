/**
 * Default Configuration Constants
 *
 * Fixed spans of the quota windows, and values components fall back to
 * when constructed without the runtime config.
 */

/**
 * Quota window spans
 */
export const RATE_WINDOWS = {
  /** Per-minute window span (ms) */
  MINUTE_MS: 60_000,

  /** Per-day window span (ms) */
  DAY_MS: 86_400_000,
} as const;

/**
 * Upstream sports-data API
 */
export const API_SPORTS = {
  DEFAULT_BASE_URL: 'https://v3.football.api-sports.io',

  /** Per-request timeout (ms) */
  DEFAULT_TIMEOUT_MS: 30_000,
} as const;

/**
 * Transport retry (transient network failures only)
 */
export const TRANSPORT_RETRY = {
  MAX_ATTEMPTS: 3,
  INITIAL_DELAY_MS: 500,
  MAX_DELAY_MS: 4_000,
  BACKOFF_MULTIPLIER: 2,
} as const;
