export { createSportsMediator } from './api/mediator.js';
export type { SportsMediator, SportsMediatorOptions, SportsMediatorStats } from './api/mediator.js';
export * from './api/errors.js';

export { FetchOrchestrator } from './core/fetch-orchestrator.js';
export type {
  FetchOptions,
  FetchOrchestratorConfig,
  FetchOrchestratorEvents,
  FetchOrchestratorStats,
  TransportRetryConfig,
} from './core/fetch-orchestrator.js';
export { RateLimiter, type RateLimiterEvents } from './core/rate-limiter.js';
export { ResponseCache } from './core/response-cache.js';
export {
  classifyFreshness,
  COMPLETED_STATUS_CODES,
  IN_PLAY_STATUS_CODES,
  type FreshnessClassifier,
} from './core/freshness-classifier.js';
export { createFingerprint, normalizeParams } from './core/fingerprint.js';
export { systemClock, type Clock } from './core/clock.js';

export {
  ApiSportsClient,
  ENDPOINTS,
  buildRequestUrl,
  parseRetryAfter,
  type ApiSportsClientConfig,
  type FetchLike,
} from './transport/api-sports-client.js';

export * from './tools/index.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getMediatorConfig,
  applyEnvOverrides,
  type Config,
  type Environment,
  type MediatorSettings,
} from './config/loader.js';

export { retryWithBackoff, RetryAbortedError, type RetryConfig } from './utils/retry.js';

export * from './types/index.js';
