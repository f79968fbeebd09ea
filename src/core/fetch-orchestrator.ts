/**
 * Fetch Orchestrator
 *
 * Single entry point for upstream data: consults the cache, coalesces
 * concurrent misses for the same query, takes admission from the rate
 * limiter, calls the upstream, retries transient transport failures, then
 * validates, classifies and stores the result. Nothing that fails
 * validation reaches the cache.
 *
 * In-flight coalescing:
 * - Map<fingerprint, InFlightFetch>, one shared promise per fingerprint
 * - Every waiter observes the same payload or the same error
 * - A waiter may abandon through its own AbortSignal; the shared fetch is
 *   cancelled only when its last waiter has left
 * - The slot is released whatever the outcome
 *
 * Everything that leaves fetch() is a MediatorError.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { MediatorError } from '../api/errors.js';
import {
  FetchCancelledError,
  QuotaExhaustedError,
  QuotaRejectedError,
  toMediatorError,
} from '../api/errors.js';
import { TRANSPORT_RETRY } from '../config/defaults.js';
import type { TtlClass } from '../types/cache.js';
import type { QueryFamily, QueryFingerprint, QueryParams, UpstreamCall } from '../types/query.js';
import { retryWithBackoff } from '../utils/retry.js';
import { createFingerprint } from './fingerprint.js';
import type { FreshnessClassifier } from './freshness-classifier.js';
import { classifyFreshness } from './freshness-classifier.js';
import type { RateLimiter } from './rate-limiter.js';
import type { ResponseCache } from './response-cache.js';

/**
 * Bounded retry of transient transport failures
 */
export interface TransportRetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface FetchOrchestratorConfig<TPayload> {
  rateLimiter: RateLimiter;
  cache: ResponseCache<TPayload>;

  /** Defaults to the sports-data classifier */
  classifier?: FreshnessClassifier;

  transportRetry?: TransportRetryConfig;

  /** Admission wait ceiling per attempt (defaults to the limiter's) */
  maxAdmissionWaitMs?: number;

  logger?: Logger;
}

export interface FetchOptions<TPayload = unknown> {
  signal?: AbortSignal;

  /**
   * Checks an upstream payload before it is classified or cached. A throw
   * fails the attempt; TransportFailure is retried like any other.
   * Coalesced callers share the first caller's check.
   */
  validate?: (payload: TPayload) => void;
}

export interface FetchOrchestratorEvents {
  'cache:hit': (fingerprint: string, family: QueryFamily) => void;
  'cache:miss': (fingerprint: string, family: QueryFamily) => void;
  coalesced: (fingerprint: string, waiters: number) => void;
  'upstream:success': (fingerprint: string, ttlClass: TtlClass, attempts: number) => void;
  'upstream:failure': (fingerprint: string, error: MediatorError) => void;
}

export interface FetchOrchestratorStats {
  requests: number;
  cacheHits: number;
  cacheMisses: number;
  coalesced: number;
  upstreamCalls: number;
  upstreamFailures: number;
  transportRetries: number;
  inFlight: number;
}

interface InFlightFetch<TPayload> {
  promise: Promise<TPayload>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

export class FetchOrchestrator<TPayload = unknown> extends EventEmitter<FetchOrchestratorEvents> {
  private readonly rateLimiter: RateLimiter;
  private readonly cache: ResponseCache<TPayload>;
  private readonly classifier: FreshnessClassifier;
  private readonly retry: TransportRetryConfig;
  private readonly maxAdmissionWaitMs?: number;
  private readonly logger?: Logger;

  private readonly inFlight = new Map<string, InFlightFetch<TPayload>>();

  private stats = {
    requests: 0,
    cacheHits: 0,
    cacheMisses: 0,
    coalesced: 0,
    upstreamCalls: 0,
    upstreamFailures: 0,
    transportRetries: 0,
  };

  constructor(config: FetchOrchestratorConfig<TPayload>) {
    super();

    this.rateLimiter = config.rateLimiter;
    this.cache = config.cache;
    this.classifier = config.classifier ?? classifyFreshness;
    this.retry = config.transportRetry ?? {
      maxAttempts: TRANSPORT_RETRY.MAX_ATTEMPTS,
      initialDelayMs: TRANSPORT_RETRY.INITIAL_DELAY_MS,
      maxDelayMs: TRANSPORT_RETRY.MAX_DELAY_MS,
      backoffMultiplier: TRANSPORT_RETRY.BACKOFF_MULTIPLIER,
    };
    this.maxAdmissionWaitMs = config.maxAdmissionWaitMs;
    this.logger = config.logger;
  }

  /**
   * Resolve a query, from the cache when possible.
   *
   * @throws {MediatorError} on every failure path
   */
  public async fetch(
    family: QueryFamily,
    params: QueryParams,
    upstreamCall: UpstreamCall<TPayload>,
    options: FetchOptions<TPayload> = {}
  ): Promise<TPayload> {
    this.stats.requests++;

    try {
      if (options.signal?.aborted) {
        throw new FetchCancelledError();
      }

      const fingerprint = createFingerprint(family, params);

      const cached = this.cache.lookup(fingerprint);
      if (cached) {
        this.stats.cacheHits++;
        this.safeEmit(() => this.emit('cache:hit', fingerprint.key, family));
        return cached.payload;
      }

      if (this.cache.isEnabled()) {
        this.stats.cacheMisses++;
        this.safeEmit(() => this.emit('cache:miss', fingerprint.key, family));
      }

      let inFlight = this.inFlight.get(fingerprint.key);
      if (inFlight) {
        this.stats.coalesced++;
        const waiters = inFlight.waiters + 1;
        this.safeEmit(() => this.emit('coalesced', fingerprint.key, waiters));
        this.logger?.debug({ fingerprint: fingerprint.key, waiters }, 'Joined in-flight fetch');
      } else {
        inFlight = this.start(fingerprint, params, upstreamCall, options.validate);
        this.inFlight.set(fingerprint.key, inFlight);
      }

      return await this.wait(fingerprint, inFlight, options.signal);
    } catch (error) {
      throw toMediatorError(error);
    }
  }

  public getInFlightCount(): number {
    return this.inFlight.size;
  }

  public getStats(): FetchOrchestratorStats {
    return {
      ...this.stats,
      inFlight: this.inFlight.size,
    };
  }

  /**
   * Cancel every in-flight fetch and drop listeners.
   */
  public dispose(): void {
    for (const inFlight of this.inFlight.values()) {
      inFlight.controller.abort();
    }
    this.inFlight.clear();
    this.removeAllListeners();
    this.logger?.debug('FetchOrchestrator disposed');
  }

  private start(
    fingerprint: QueryFingerprint,
    params: QueryParams,
    upstreamCall: UpstreamCall<TPayload>,
    validate?: (payload: TPayload) => void
  ): InFlightFetch<TPayload> {
    const controller = new AbortController();

    const promise = this.execute(fingerprint, params, upstreamCall, controller.signal, validate).finally(() => {
      entry.settled = true;
      if (this.inFlight.get(fingerprint.key) === entry) {
        this.inFlight.delete(fingerprint.key);
      }
    });

    const entry: InFlightFetch<TPayload> = {
      promise,
      controller,
      waiters: 0,
      settled: false,
    };

    // Waiters may all have left; the failure is already logged in execute()
    void promise.catch((error: unknown) => {
      this.logger?.debug({ fingerprint: fingerprint.key, err: error }, 'Shared fetch settled with error');
    });

    return entry;
  }

  private async wait(
    fingerprint: QueryFingerprint,
    inFlight: InFlightFetch<TPayload>,
    signal?: AbortSignal
  ): Promise<TPayload> {
    inFlight.waiters++;
    try {
      return signal ? await raceAbort(inFlight.promise, signal) : await inFlight.promise;
    } finally {
      inFlight.waiters--;
      if (inFlight.waiters === 0 && !inFlight.settled) {
        this.abandon(fingerprint, inFlight);
      }
    }
  }

  private abandon(fingerprint: QueryFingerprint, inFlight: InFlightFetch<TPayload>): void {
    if (this.inFlight.get(fingerprint.key) === inFlight) {
      this.inFlight.delete(fingerprint.key);
    }
    inFlight.controller.abort();
    this.logger?.debug({ fingerprint: fingerprint.key }, 'All waiters left, cancelling shared fetch');
  }

  private async execute(
    fingerprint: QueryFingerprint,
    params: QueryParams,
    upstreamCall: UpstreamCall<TPayload>,
    signal: AbortSignal,
    validate?: (payload: TPayload) => void
  ): Promise<TPayload> {
    const { family } = fingerprint;
    let attempts = 0;

    try {
      const payload = await retryWithBackoff(
        async (attempt) => {
          attempts = attempt;
          await this.rateLimiter.acquireSlot({ signal, maxWaitMs: this.maxAdmissionWaitMs });
          this.stats.upstreamCalls++;
          const result = await this.callUpstream(family, params, upstreamCall, signal);
          validate?.(result);
          return result;
        },
        {
          ...this.retry,
          retryableErrors: ['TransportFailure'],
          signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.stats.transportRetries++;
            this.logger?.warn(
              { fingerprint: fingerprint.key, attempt, delayMs, err: error },
              'Transport failure, retrying'
            );
          },
        }
      );

      this.rateLimiter.recordOutcome({ success: true });

      const ttlClass = this.classifier(family, params, payload);
      this.cache.store(fingerprint, payload, ttlClass);

      this.safeEmit(() => this.emit('upstream:success', fingerprint.key, ttlClass, attempts));
      this.logger?.debug({ fingerprint: fingerprint.key, ttlClass, attempts }, 'Upstream fetch completed');

      return payload;
    } catch (error) {
      const failure = toMediatorError(error);
      this.stats.upstreamFailures++;
      this.safeEmit(() => this.emit('upstream:failure', fingerprint.key, failure));

      if (failure.code === 'InternalInvariantViolation') {
        this.logger?.error({ fingerprint: fingerprint.key, err: failure }, failure.message);
      } else if (failure.code !== 'Cancelled') {
        this.logger?.warn(
          { fingerprint: fingerprint.key, code: failure.code, attempts },
          'Upstream fetch failed'
        );
      }

      throw failure;
    }
  }

  private async callUpstream(
    family: QueryFamily,
    params: QueryParams,
    upstreamCall: UpstreamCall<TPayload>,
    signal: AbortSignal
  ): Promise<TPayload> {
    try {
      return await upstreamCall(family, params, signal);
    } catch (error) {
      if (error instanceof QuotaRejectedError) {
        const delayMs = this.rateLimiter.recordOutcome({
          success: false,
          quotaRejected: true,
          retryAfterMs: error.retryAfterMs,
          window: error.window,
        });
        throw new QuotaExhaustedError('Upstream rejected the call for quota', {
          retryInMs: delayMs,
          window: error.window,
        });
      }
      throw toMediatorError(error);
    }
  }

  private safeEmit(emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err }, 'FetchOrchestrator event listener failed');
    }
  }
}

/**
 * Settle with `promise`, or reject with FetchCancelledError as soon as the
 * signal aborts. The shared promise itself is left running.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new FetchCancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new FetchCancelledError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
