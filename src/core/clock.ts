/**
 * Time source injected into the cache and the rate limiter.
 *
 * `monotonic()` drives every interval: window stamps, backoff floors and
 * TTL expiry. `now()` is only used for timestamps reported to callers, so a
 * wall-clock step cannot empty a rate window or expire a cache entry.
 */

import { performance } from 'node:perf_hooks';

export interface Clock {
  /** Wall-clock time in milliseconds since the epoch */
  now(): number;

  /** Milliseconds from an arbitrary origin; never goes backwards */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now(),
};
