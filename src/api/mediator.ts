/**
 * Sports-data mediator factory
 *
 * Wires config → logger → cache → rate limiter → orchestrator → client →
 * tools. One mediator owns one API credential: every tool call it serves
 * shares the same quota windows.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import type { Config } from '../config/loader.js';
import { getConfig, getMediatorConfig } from '../config/loader.js';
import type { Clock } from '../core/clock.js';
import type { FetchOrchestratorStats } from '../core/fetch-orchestrator.js';
import { FetchOrchestrator } from '../core/fetch-orchestrator.js';
import type { FreshnessClassifier } from '../core/freshness-classifier.js';
import { RateLimiter } from '../core/rate-limiter.js';
import { ResponseCache } from '../core/response-cache.js';
import type { Toolset } from '../tools/index.js';
import { createToolset } from '../tools/index.js';
import type { FetchLike } from '../transport/api-sports-client.js';
import { ApiSportsClient } from '../transport/api-sports-client.js';
import type { ResponseCacheStats } from '../types/cache.js';
import type { RateLimiterStats, RemainingQuota } from '../types/rate-limit.js';
import type { ApiSportsEnvelope } from '../types/schemas/api-sports.js';

export interface SportsMediatorOptions {
  /** Validated runtime config (defaults to config/runtime.yaml) */
  config?: Config;

  /** Root logger (defaults to pino at the configured level) */
  logger?: Logger;

  fetchImpl?: FetchLike;
  clock?: Clock;
  random?: () => number;
  classifier?: FreshnessClassifier;
}

export interface SportsMediatorStats {
  cache: ResponseCacheStats;
  rateLimiter: RateLimiterStats;
  orchestrator: FetchOrchestratorStats;
  client: { requests: number; failures: number; quotaRejections: number };
  remaining: RemainingQuota;
}

export interface SportsMediator {
  orchestrator: FetchOrchestrator<ApiSportsEnvelope>;
  cache: ResponseCache<ApiSportsEnvelope>;
  rateLimiter: RateLimiter;
  client: ApiSportsClient;
  tools: Toolset;
  logger: Logger;
  getStats(): SportsMediatorStats;
  dispose(): void;
}

export function createSportsMediator(options: SportsMediatorOptions = {}): SportsMediator {
  const settings = getMediatorConfig(options.config ?? getConfig());
  const logger = options.logger ?? pino({ level: settings.logLevel });
  const clock = options.clock;

  const cache = new ResponseCache<ApiSportsEnvelope>({
    ...settings.cache,
    clock,
    logger: logger.child({ component: 'ResponseCache' }),
  });

  const rateLimiter = new RateLimiter({
    ...settings.rateLimiter,
    clock,
    random: options.random,
    logger: logger.child({ component: 'RateLimiter' }),
  });

  const orchestrator = new FetchOrchestrator<ApiSportsEnvelope>({
    rateLimiter,
    cache,
    classifier: options.classifier,
    transportRetry: settings.transportRetry,
    maxAdmissionWaitMs: settings.rateLimiter.maxAdmissionWaitMs,
    logger: logger.child({ component: 'FetchOrchestrator' }),
  });

  const client = new ApiSportsClient({
    ...settings.client,
    fetchImpl: options.fetchImpl,
    now: clock ? () => clock.now() : undefined,
    logger: logger.child({ component: 'ApiSportsClient' }),
  });

  const tools = createToolset(orchestrator, client.call, {
    logger: logger.child({ component: 'tools' }),
  });

  logger.info(
    {
      baseUrl: settings.client.baseUrl,
      cacheEnabled: settings.cache.enabled,
      callsPerMinute: settings.rateLimiter.callsPerMinute,
      callsPerDay: settings.rateLimiter.callsPerDay,
    },
    'Sports-data mediator ready'
  );

  return {
    orchestrator,
    cache,
    rateLimiter,
    client,
    tools,
    logger,
    getStats: () => ({
      cache: cache.getStats(),
      rateLimiter: rateLimiter.getStats(),
      orchestrator: orchestrator.getStats(),
      client: client.getStats(),
      remaining: rateLimiter.getRemaining(),
    }),
    dispose: () => {
      orchestrator.dispose();
      cache.dispose();
      rateLimiter.removeAllListeners();
      logger.debug('Sports-data mediator disposed');
    },
  };
}
