/**
 * Rate Limiter Types
 *
 * @module types/rate-limit
 */

import type { Logger } from 'pino';
import type { Clock } from '../core/clock.js';

export enum RateWindowKind {
  MINUTE = 'minute',
  DAY = 'day',
}

/**
 * Sliding window of admitted calls.
 *
 * Invariant: `timestamps.length <= limit` once stale stamps are pruned.
 */
export interface RateWindow {
  readonly kind: RateWindowKind;
  readonly limit: number;
  readonly spanMs: number;
  /** Admission timestamps, oldest first */
  timestamps: number[];
}

/**
 * What blocked an admission: one of the windows, or the backoff floor set
 * after an upstream quota rejection.
 */
export type AdmissionBlocker = RateWindowKind | 'backoff';

export type AdmissionDecision =
  | { kind: 'admit' }
  | { kind: 'wait'; waitMs: number; blockedBy: AdmissionBlocker }
  | { kind: 'reject'; reason: string; retryInMs: number };

export interface RateLimiterConfig {
  callsPerMinute: number;
  callsPerDay: number;

  /** Longest a caller may be kept waiting for admission (ms) */
  maxAdmissionWaitMs: number;

  /** First backoff delay after an upstream quota rejection (ms) */
  baseBackoffMs: number;

  /** Backoff cap (ms) */
  maxBackoffMs: number;

  /** Jitter added on top of the backoff delay, as a fraction of it (0-1) */
  jitter: number;

  clock?: Clock;

  /** Random source for jitter, [0, 1) */
  random?: () => number;

  logger?: Logger;
}

/**
 * Outcome of an admitted upstream call, reported back to the limiter.
 */
export interface CallOutcome {
  success: boolean;
  /** Upstream rejected the call for quota reasons (HTTP 429 or equivalent) */
  quotaRejected?: boolean;
  /** Window the upstream reported as exhausted (defaults to MINUTE) */
  window?: RateWindowKind;
  /** Upstream-supplied retry-after hint (ms) */
  retryAfterMs?: number;
}

export interface AcquireSlotOptions {
  signal?: AbortSignal;
  /** Overrides `maxAdmissionWaitMs` for this call */
  maxWaitMs?: number;
}

export interface RemainingQuota {
  minute: number;
  day: number;
}

export interface RateLimiterStats {
  admitted: number;
  deferred: number;
  rejected: number;
  quotaRejections: number;
  consecutiveRejections: number;
  waiting: number;
  /** Wall-clock time the backoff floor lifts, or null when not backing off */
  blockedUntil: number | null;
  remaining: RemainingQuota;
}
