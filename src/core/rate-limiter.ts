/**
 * Dual-Window Rate Limiter
 *
 * Keeps the upstream call budget for one shared API credential. Two sliding
 * windows (per minute, per day) record the timestamp of every admitted call;
 * a call is admitted only while both windows are below their limit.
 *
 * Admission:
 * - acquire() decides synchronously: admit (and reserve), wait, or reject
 * - acquireSlot() suspends on `wait` until admitted, bounded by
 *   `maxAdmissionWaitMs` and cancellable through an AbortSignal
 *
 * Decisions never await between the check and the reservation, so on the
 * event loop two racing callers cannot both take the last slot. Windows and
 * the backoff floor run on the clock's monotonic reading.
 *
 * Upstream quota rejections (HTTP 429):
 * - the reported window is filled up to its limit
 * - the retry-after hint, when present, becomes the wait floor as-is
 * - otherwise the floor is base * 2^(n-1) plus jitter, capped at maxBackoffMs
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { FetchCancelledError, QuotaExhaustedError } from '../api/errors.js';
import { RATE_WINDOWS } from '../config/defaults.js';
import { abortableDelay, RetryAbortedError } from '../utils/retry.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type {
  AcquireSlotOptions,
  AdmissionBlocker,
  AdmissionDecision,
  CallOutcome,
  RateLimiterConfig,
  RateLimiterStats,
  RateWindow,
  RemainingQuota,
} from '../types/rate-limit.js';
import { RateWindowKind } from '../types/rate-limit.js';

export interface RateLimiterEvents {
  admitted: (remaining: RemainingQuota) => void;
  deferred: (waitMs: number, blockedBy: AdmissionBlocker) => void;
  rejected: (reason: string, retryInMs: number) => void;
  backoff: (delayMs: number, consecutiveRejections: number, window: RateWindowKind) => void;
}

export class RateLimiter extends EventEmitter<RateLimiterEvents> {
  private readonly config: RateLimiterConfig;
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private readonly random: () => number;

  private readonly windows: Record<RateWindowKind, RateWindow>;

  /** Earliest monotonic time a new call may go out after a quota rejection */
  private blockedUntil = 0;
  private consecutiveRejections = 0;
  private waiting = 0;

  private stats = {
    admitted: 0,
    deferred: 0,
    rejected: 0,
    quotaRejections: 0,
  };

  constructor(config: RateLimiterConfig) {
    super();

    if (config.callsPerMinute < 1 || config.callsPerDay < 1) {
      throw new Error('Rate limits must be >= 1');
    }
    if (config.maxBackoffMs < config.baseBackoffMs) {
      throw new Error('maxBackoffMs must be >= baseBackoffMs');
    }

    this.config = config;
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;
    this.random = config.random ?? Math.random;

    this.windows = {
      [RateWindowKind.MINUTE]: {
        kind: RateWindowKind.MINUTE,
        limit: config.callsPerMinute,
        spanMs: RATE_WINDOWS.MINUTE_MS,
        timestamps: [],
      },
      [RateWindowKind.DAY]: {
        kind: RateWindowKind.DAY,
        limit: config.callsPerDay,
        spanMs: RATE_WINDOWS.DAY_MS,
        timestamps: [],
      },
    };

    this.logger?.info(
      {
        callsPerMinute: config.callsPerMinute,
        callsPerDay: config.callsPerDay,
        maxAdmissionWaitMs: config.maxAdmissionWaitMs,
      },
      'RateLimiter initialized'
    );
  }

  /**
   * Decide whether one upstream call may go out now.
   *
   * On `admit` the call is already counted in both windows.
   */
  public acquire(): AdmissionDecision {
    const now = this.clock.monotonic();
    this.prune(now);

    let waitMs = 0;
    let blockedBy: AdmissionBlocker | undefined;

    if (this.blockedUntil > now) {
      waitMs = this.blockedUntil - now;
      blockedBy = 'backoff';
    }

    for (const window of Object.values(this.windows)) {
      if (window.timestamps.length < window.limit) {
        continue;
      }
      const freesAt = this.nextFreeAt(window);
      if (freesAt - now > waitMs) {
        waitMs = freesAt - now;
        blockedBy = window.kind;
      }
    }

    if (blockedBy === undefined) {
      for (const window of Object.values(this.windows)) {
        window.timestamps.push(now);
      }
      this.stats.admitted++;
      const remaining = this.getRemaining();
      this.safeEmit(() => this.emit('admitted', remaining));
      this.logger?.debug({ remaining }, 'Upstream call admitted');
      return { kind: 'admit' };
    }

    const blocker: AdmissionBlocker = blockedBy;
    const rejectReason = this.rejectionReason(blocker, waitMs);
    if (rejectReason) {
      this.stats.rejected++;
      this.safeEmit(() => this.emit('rejected', rejectReason, waitMs));
      this.logger?.warn({ retryInMs: waitMs, blockedBy: blocker }, rejectReason);
      return { kind: 'reject', reason: rejectReason, retryInMs: waitMs };
    }

    this.stats.deferred++;
    this.safeEmit(() => this.emit('deferred', waitMs, blocker));
    this.logger?.debug({ waitMs, blockedBy: blocker }, 'Upstream call deferred');
    return { kind: 'wait', waitMs, blockedBy: blocker };
  }

  /**
   * Wait until a call is admitted.
   *
   * @throws {QuotaExhaustedError} on rejection, or when admission would take
   * longer than the wait ceiling
   * @throws {FetchCancelledError} when the signal aborts while waiting
   */
  public async acquireSlot(options: AcquireSlotOptions = {}): Promise<void> {
    const maxWaitMs = options.maxWaitMs ?? this.config.maxAdmissionWaitMs;
    const deadline = this.clock.monotonic() + maxWaitMs;

    for (;;) {
      if (options.signal?.aborted) {
        throw new FetchCancelledError('Fetch cancelled while waiting for admission');
      }

      const decision = this.acquire();

      if (decision.kind === 'admit') {
        return;
      }

      if (decision.kind === 'reject') {
        throw new QuotaExhaustedError(decision.reason, { retryInMs: decision.retryInMs });
      }

      if (this.clock.monotonic() + decision.waitMs > deadline) {
        throw new QuotaExhaustedError('Upstream quota not available within the admission wait ceiling', {
          retryInMs: decision.waitMs,
          blockedBy: decision.blockedBy,
          maxWaitMs,
        });
      }

      this.waiting++;
      try {
        await abortableDelay(decision.waitMs, options.signal);
      } catch (error) {
        if (error instanceof RetryAbortedError) {
          throw new FetchCancelledError('Fetch cancelled while waiting for admission');
        }
        throw error;
      } finally {
        this.waiting--;
      }
    }
  }

  /**
   * Report how an admitted call went.
   *
   * @returns Backoff delay applied (ms), 0 when none
   */
  public recordOutcome(outcome: CallOutcome): number {
    if (outcome.success) {
      this.consecutiveRejections = 0;
      return 0;
    }

    if (!outcome.quotaRejected) {
      return 0;
    }

    const now = this.clock.monotonic();
    const kind = outcome.window ?? RateWindowKind.MINUTE;
    this.prune(now);
    this.saturate(this.windows[kind], now);

    this.consecutiveRejections++;
    this.stats.quotaRejections++;

    const delayMs =
      outcome.retryAfterMs !== undefined && outcome.retryAfterMs >= 0
        ? outcome.retryAfterMs
        : this.backoffDelay(this.consecutiveRejections);

    this.blockedUntil = Math.max(this.blockedUntil, now + delayMs);

    this.safeEmit(() => this.emit('backoff', delayMs, this.consecutiveRejections, kind));
    this.logger?.warn(
      {
        window: kind,
        delayMs,
        retryAfterHint: outcome.retryAfterMs !== undefined,
        consecutiveRejections: this.consecutiveRejections,
      },
      'Upstream rejected call for quota, backing off'
    );

    return delayMs;
  }

  public getRemaining(): RemainingQuota {
    this.prune(this.clock.monotonic());
    const minute = this.windows[RateWindowKind.MINUTE];
    const day = this.windows[RateWindowKind.DAY];

    return {
      minute: Math.max(0, minute.limit - minute.timestamps.length),
      day: Math.max(0, day.limit - day.timestamps.length),
    };
  }

  public getStats(): RateLimiterStats {
    const now = this.clock.monotonic();
    return {
      ...this.stats,
      consecutiveRejections: this.consecutiveRejections,
      waiting: this.waiting,
      blockedUntil: this.blockedUntil > now ? this.clock.now() + (this.blockedUntil - now) : null,
      remaining: this.getRemaining(),
    };
  }

  private prune(now: number): void {
    for (const window of Object.values(this.windows)) {
      const cutoff = now - window.spanMs;
      let stale = 0;
      while (stale < window.timestamps.length && window.timestamps[stale] <= cutoff) {
        stale++;
      }
      if (stale > 0) {
        window.timestamps.splice(0, stale);
      }
    }
  }

  /**
   * When enough stamps age out for the window to drop below its limit.
   */
  private nextFreeAt(window: RateWindow): number {
    const index = window.timestamps.length - window.limit;
    return window.timestamps[index] + window.spanMs;
  }

  private saturate(window: RateWindow, now: number): void {
    while (window.timestamps.length < window.limit) {
      window.timestamps.push(now);
    }
  }

  private backoffDelay(consecutive: number): number {
    const base = this.config.baseBackoffMs * 2 ** (consecutive - 1);
    const jitter = Math.min(Math.max(this.config.jitter, 0), 1);
    const jittered = base + base * jitter * this.random();
    return Math.min(this.config.maxBackoffMs, Math.round(jittered));
  }

  private rejectionReason(blockedBy: AdmissionBlocker, waitMs: number): string | undefined {
    if (waitMs <= this.config.maxAdmissionWaitMs) {
      return undefined;
    }
    if (blockedBy === RateWindowKind.DAY) {
      return 'daily quota exhausted';
    }
    if (blockedBy === 'backoff') {
      return 'upstream quota backoff exceeds admission wait ceiling';
    }
    return undefined;
  }

  private safeEmit(emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err }, 'RateLimiter event listener failed');
    }
  }
}
