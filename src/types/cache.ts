/**
 * Response Cache Types
 *
 * @module types/cache
 */

import type { Logger } from 'pino';
import type { Clock } from '../core/clock.js';
import type { QueryFamily } from './query.js';

/**
 * Freshness policy assigned to a fetched result.
 */
export enum TtlClass {
  /** Never expires by time (completed matches) */
  PERMANENT = 'permanent',
  /** Reference data such as teams and venues */
  LONG = 'long',
  /** Scheduled fixtures and statistics snapshots */
  MEDIUM = 'medium',
  /** Never cached (live matches) */
  NONE = 'none',
}

export interface CacheEntry<TPayload> {
  readonly fingerprint: string;
  readonly family: QueryFamily;
  /** Normalized query the fingerprint was derived from */
  readonly query: string;
  readonly payload: TPayload;
  readonly ttlClass: TtlClass;
  readonly storedAt: number;
  /** Expiry timestamp (ms), or null for entries that never expire */
  readonly expiresAt: number | null;
  /** Expiry on the clock's monotonic reading; what lookups check */
  readonly deadline: number | null;
  lastAccessedAt: number;
}

export interface ResponseCacheConfig {
  /** When false, lookups always miss and stores are dropped */
  enabled: boolean;

  /** Entry-count ceiling before LRU eviction */
  maxEntries: number;

  /** TTL applied to LONG entries (ms) */
  longTtlMs: number;

  /** TTL applied to MEDIUM entries (ms) */
  mediumTtlMs: number;

  /** Periodic purge interval (ms); 0 disables the timer */
  purgeIntervalMs?: number;

  clock?: Clock;

  logger?: Logger;
}

export interface ResponseCacheStats {
  enabled: boolean;
  size: number;
  permanentEntries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  invalidations: number;
  hitRate: number;
}
