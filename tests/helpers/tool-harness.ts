import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { FetchOrchestrator } from '../../src/core/fetch-orchestrator.js';
import { RateLimiter } from '../../src/core/rate-limiter.js';
import { ResponseCache } from '../../src/core/response-cache.js';
import { createToolset } from '../../src/tools/index.js';
import type { Toolset } from '../../src/tools/index.js';
import type { UpstreamCall } from '../../src/types/query.js';
import type { ApiSportsEnvelope } from '../../src/types/schemas/api-sports.js';
import { ManualClock } from './manual-clock.js';

export interface ToolHarness {
  tools: Toolset;
  upstream: Mock<UpstreamCall<ApiSportsEnvelope>>;
  orchestrator: FetchOrchestrator<ApiSportsEnvelope>;
  dispose(): void;
}

/**
 * Toolset over a real orchestrator with a scripted upstream and a fixed
 * request id.
 */
export function createToolHarness(): ToolHarness {
  const clock = new ManualClock();
  const rateLimiter = new RateLimiter({
    callsPerMinute: 30,
    callsPerDay: 100,
    maxAdmissionWaitMs: 120_000,
    baseBackoffMs: 1_000,
    maxBackoffMs: 60_000,
    jitter: 0,
    clock,
  });
  const cache = new ResponseCache<ApiSportsEnvelope>({
    enabled: true,
    maxEntries: 100,
    longTtlMs: 86_400_000,
    mediumTtlMs: 3_600_000,
    clock,
  });
  const orchestrator = new FetchOrchestrator<ApiSportsEnvelope>({
    rateLimiter,
    cache,
    transportRetry: { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
  });
  const upstream = vi.fn<UpstreamCall<ApiSportsEnvelope>>();

  return {
    tools: createToolset(orchestrator, upstream, { requestId: () => 'req-1' }),
    upstream,
    orchestrator,
    dispose: () => {
      orchestrator.dispose();
      cache.dispose();
    },
  };
}
