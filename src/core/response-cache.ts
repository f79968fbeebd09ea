/**
 * Response Cache (LRU with TTL classes)
 *
 * Keeps upstream results keyed by query fingerprint. How long an entry
 * lives is decided per write by its TTL class; PERMANENT entries never
 * expire by time.
 *
 * LRU Eviction Logic:
 * - Map iteration order === insertion order (oldest first)
 * - On lookup hit: delete() then set() moves the entry to the end
 * - When full: evict the least recently used non-permanent entry; permanent
 *   entries go only when nothing else is left
 *
 * Expiry is lazy (checked on lookup against the clock's monotonic reading);
 * purgeExpired() and the optional purge timer only bound memory.
 */

import type { Logger } from 'pino';
import { InvariantViolationError } from '../api/errors.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { CacheEntry, ResponseCacheConfig, ResponseCacheStats } from '../types/cache.js';
import { TtlClass } from '../types/cache.js';
import type { QueryFamily, QueryFingerprint } from '../types/query.js';

export class ResponseCache<TPayload = unknown> {
  private readonly config: ResponseCacheConfig;
  private readonly logger?: Logger;
  private readonly clock: Clock;

  private readonly entries = new Map<string, CacheEntry<TPayload>>();

  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    expirations: 0,
    invalidations: 0,
  };

  private purgeTimer?: NodeJS.Timeout;

  constructor(config: ResponseCacheConfig) {
    if (config.maxEntries < 1) {
      throw new Error('maxEntries must be >= 1');
    }

    this.config = config;
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;

    const purgeIntervalMs = config.purgeIntervalMs ?? 0;
    if (config.enabled && purgeIntervalMs > 0) {
      this.purgeTimer = setInterval(() => {
        this.purgeExpired();
      }, purgeIntervalMs);
      this.purgeTimer.unref();
    }

    this.logger?.info(
      {
        enabled: config.enabled,
        maxEntries: config.maxEntries,
        longTtlMs: config.longTtlMs,
        mediumTtlMs: config.mediumTtlMs,
      },
      'ResponseCache initialized'
    );
  }

  public isEnabled(): boolean {
    return this.config.enabled;
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Return the live entry for a fingerprint, or undefined on a miss.
   *
   * @throws {InvariantViolationError} when the stored entry belongs to a
   * different query than the fingerprint describes.
   */
  public lookup(fingerprint: QueryFingerprint): CacheEntry<TPayload> | undefined {
    if (!this.config.enabled) {
      return undefined;
    }

    const entry = this.entries.get(fingerprint.key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    this.assertSameQuery(entry, fingerprint);

    if (this.isExpired(entry, this.clock.monotonic())) {
      this.entries.delete(fingerprint.key);
      this.stats.expirations++;
      this.stats.misses++;
      this.logger?.debug({ fingerprint: fingerprint.key }, 'Cache miss (expired)');
      return undefined;
    }

    const now = this.clock.now();
    this.entries.delete(fingerprint.key);
    entry.lastAccessedAt = now;
    this.entries.set(fingerprint.key, entry);
    this.stats.hits++;

    this.logger?.debug(
      { fingerprint: fingerprint.key, ageMs: now - entry.storedAt, ttlClass: entry.ttlClass },
      'Cache hit'
    );

    return entry;
  }

  /**
   * Store a payload under a fingerprint, replacing any previous entry.
   *
   * NONE results are not stored, and any older entry for the same
   * fingerprint is dropped so it cannot be served in their place.
   */
  public store(fingerprint: QueryFingerprint, payload: TPayload, ttlClass: TtlClass): void {
    if (!this.config.enabled) {
      return;
    }

    const existing = this.entries.get(fingerprint.key);
    if (existing) {
      this.assertSameQuery(existing, fingerprint);
      this.entries.delete(fingerprint.key);
    }

    if (ttlClass === TtlClass.NONE) {
      this.logger?.debug({ fingerprint: fingerprint.key }, 'Result not cacheable, skipping');
      return;
    }

    while (this.entries.size >= this.config.maxEntries) {
      this.evictOne();
    }

    const now = this.clock.now();
    const entry: CacheEntry<TPayload> = {
      fingerprint: fingerprint.key,
      family: fingerprint.family,
      query: fingerprint.canonical,
      payload,
      ttlClass,
      storedAt: now,
      expiresAt: this.expiryFor(ttlClass, now),
      deadline: this.expiryFor(ttlClass, this.clock.monotonic()),
      lastAccessedAt: now,
    };

    this.entries.set(fingerprint.key, entry);

    this.logger?.debug(
      {
        fingerprint: fingerprint.key,
        ttlClass,
        expiresAt: entry.expiresAt,
        size: this.entries.size,
      },
      'Cache set'
    );
  }

  /**
   * Remove a single entry. Accepts a fingerprint or its key.
   */
  public invalidate(fingerprint: QueryFingerprint | string): boolean {
    const key = typeof fingerprint === 'string' ? fingerprint : fingerprint.key;
    const removed = this.entries.delete(key);
    if (removed) {
      this.stats.invalidations++;
      this.logger?.info({ fingerprint: key }, 'Cache entry invalidated');
    }
    return removed;
  }

  /**
   * Remove every entry of one query family.
   */
  public invalidateFamily(family: QueryFamily): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.family === family) {
        this.entries.delete(key);
        removed++;
      }
    }

    this.stats.invalidations += removed;
    this.logger?.info({ family, removed }, 'Cache family invalidated');
    return removed;
  }

  public clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.stats.invalidations += removed;
    this.logger?.info({ removed }, 'Cache cleared');
    return removed;
  }

  /**
   * Drop every expired entry.
   *
   * @returns Number of entries removed
   */
  public purgeExpired(): number {
    const now = this.clock.monotonic();
    let purged = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        purged++;
      }
    }

    if (purged > 0) {
      this.stats.expirations += purged;
      this.logger?.debug({ purged }, 'Purged expired cache entries');
    }

    return purged;
  }

  public getStats(): ResponseCacheStats {
    const total = this.stats.hits + this.stats.misses;
    let permanentEntries = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt === null) {
        permanentEntries++;
      }
    }

    return {
      enabled: this.config.enabled,
      size: this.entries.size,
      permanentEntries,
      maxEntries: this.config.maxEntries,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      expirations: this.stats.expirations,
      invalidations: this.stats.invalidations,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  /**
   * Stop the purge timer and drop all entries.
   */
  public dispose(): void {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = undefined;
    }
    this.entries.clear();
    this.logger?.debug('ResponseCache disposed');
  }

  private expiryFor(ttlClass: TtlClass, now: number): number | null {
    switch (ttlClass) {
      case TtlClass.PERMANENT:
        return null;
      case TtlClass.LONG:
        return now + this.config.longTtlMs;
      case TtlClass.MEDIUM:
        return now + this.config.mediumTtlMs;
      case TtlClass.NONE:
        return now;
    }
  }

  private isExpired(entry: CacheEntry<TPayload>, monotonicNow: number): boolean {
    return entry.deadline !== null && monotonicNow >= entry.deadline;
  }

  private evictOne(): void {
    let victim: string | undefined;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null) {
        victim = key;
        break;
      }
    }

    // Only permanent entries left
    victim ??= this.entries.keys().next().value;
    if (victim === undefined) {
      return;
    }

    this.entries.delete(victim);
    this.stats.evictions++;
    this.logger?.debug({ fingerprint: victim }, 'Cache eviction');
  }

  private assertSameQuery(entry: CacheEntry<TPayload>, fingerprint: QueryFingerprint): void {
    if (entry.family === fingerprint.family && entry.query === fingerprint.canonical) {
      return;
    }

    const error = new InvariantViolationError('Fingerprint collision between distinct queries', {
      fingerprint: fingerprint.key,
      storedFamily: entry.family,
      requestedFamily: fingerprint.family,
    });
    this.logger?.error({ err: error }, error.message);
    throw error;
  }
}
