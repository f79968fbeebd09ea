/**
 * Sports-data HTTP client
 *
 * Performs one GET per call and maps every response onto the error classes
 * the fetch orchestrator understands. It does not rate limit, cache or
 * retry; the orchestrator owns all three.
 *
 * | Response                                  | Result                       |
 * |-------------------------------------------|------------------------------|
 * | network error, timeout, 5xx, invalid JSON | TransportFailureError        |
 * | 429                                       | QuotaRejectedError           |
 * | other non-2xx                             | UpstreamError (with status)  |
 * | 2xx with `errors.requests`                | QuotaRejectedError (day)     |
 * | 2xx with `errors.rateLimit`               | QuotaRejectedError (minute)  |
 * | 2xx with any other errors                 | UpstreamError                |
 */

import type { Logger } from 'pino';
import {
  FetchCancelledError,
  QuotaRejectedError,
  TransportFailureError,
  UpstreamError,
} from '../api/errors.js';
import { API_SPORTS } from '../config/defaults.js';
import { normalizeParams } from '../core/fingerprint.js';
import type { QueryFamily, QueryParams, UpstreamCall } from '../types/query.js';
import { RateWindowKind } from '../types/rate-limit.js';
import type { ApiSportsEnvelope } from '../types/schemas/api-sports.js';
import { ApiSportsEnvelopeSchema } from '../types/schemas/api-sports.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiSportsClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;

  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;

  /** Clock for HTTP-date Retry-After values */
  now?: () => number;

  logger?: Logger;
}

/** Upstream path per query family */
export const ENDPOINTS: Readonly<Record<QueryFamily, string>> = {
  teams: '/teams',
  fixtures: '/fixtures',
  team_statistics: '/teams/statistics',
  standings: '/standings',
  head2head: '/fixtures/headtohead',
  predictions: '/predictions',
};

/** Parameter names that differ on the wire */
const WIRE_PARAM_NAMES: Readonly<Record<string, string>> = {
  from_date: 'from',
  to_date: 'to',
};

/**
 * Convert a Retry-After header (delta seconds or HTTP date) to milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Build the request URL for a family and its parameters.
 */
export function buildRequestUrl(baseUrl: string, family: QueryFamily, params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [name, value] of normalizeParams(params)) {
    search.append(WIRE_PARAM_NAMES[name] ?? name, value);
  }

  const query = search.toString();
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}${ENDPOINTS[family]}${query ? `?${query}` : ''}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeErrors(errors: Record<string, unknown> | unknown[]): string {
  const values = Array.isArray(errors)
    ? errors
    : Object.entries(errors).map(([key, value]) => `${key}: ${String(value)}`);
  return values.map((value) => String(value)).join('; ');
}

function hasErrors(errors: ApiSportsEnvelope['errors']): errors is Record<string, unknown> | unknown[] {
  if (errors === undefined) {
    return false;
  }
  return Array.isArray(errors) ? errors.length > 0 : Object.keys(errors).length > 0;
}

export class ApiSportsClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly logger?: Logger;

  private stats = {
    requests: 0,
    failures: 0,
    quotaRejections: 0,
  };

  constructor(config: ApiSportsClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? API_SPORTS.DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? API_SPORTS.DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = config.now ?? Date.now;
    this.logger = config.logger;

    if (!this.apiKey) {
      this.logger?.warn('No API key configured, upstream calls will be rejected');
    }
  }

  /**
   * UpstreamCall bound to this client, for the fetch orchestrator.
   */
  public readonly call: UpstreamCall<ApiSportsEnvelope> = (family, params, signal) =>
    this.get(family, params, signal);

  public async get(
    family: QueryFamily,
    params: QueryParams,
    signal?: AbortSignal
  ): Promise<ApiSportsEnvelope> {
    if (signal?.aborted) {
      throw new FetchCancelledError();
    }

    const url = buildRequestUrl(this.baseUrl, family, params);
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.stats.requests++;
    const startedAt = this.now();

    try {
      this.logger?.debug({ family, url }, 'Upstream request');

      let response: Response;
      let body: string;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: { 'x-apisports-key': this.apiKey, accept: 'application/json' },
          signal: controller.signal,
        });
        body = await response.text();
      } catch (error) {
        if (signal?.aborted) {
          throw new FetchCancelledError();
        }
        if (timedOut) {
          throw new TransportFailureError(`Upstream request timed out after ${this.timeoutMs}ms`, {
            family,
            timeoutMs: this.timeoutMs,
          });
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new TransportFailureError(`Upstream request failed: ${message}`, { family });
      }

      this.logRateLimitHeaders(response, family);

      const envelope = this.interpret(family, response, body);
      this.logger?.debug(
        { family, status: response.status, results: envelope.results, durationMs: this.now() - startedAt },
        'Upstream response'
      );
      return envelope;
    } catch (error) {
      this.stats.failures++;
      if (error instanceof QuotaRejectedError) {
        this.stats.quotaRejections++;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  public getStats(): { requests: number; failures: number; quotaRejections: number } {
    return { ...this.stats };
  }

  private interpret(family: QueryFamily, response: Response, body: string): ApiSportsEnvelope {
    const { status } = response;
    const parsedBody = this.parseJson(body);

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.now());
      const window = this.quotaWindowFromBody(parsedBody) ?? RateWindowKind.MINUTE;
      throw new QuotaRejectedError('Upstream rate limit exceeded', { retryAfterMs, window, status });
    }

    if (status >= 500) {
      throw new TransportFailureError(`Upstream server error (HTTP ${status})`, { family, status });
    }

    if (status < 200 || status >= 300) {
      const detail = isRecord(parsedBody) && typeof parsedBody['message'] === 'string'
        ? parsedBody['message']
        : body.slice(0, 200);
      throw new UpstreamError(`Upstream returned status ${status}${detail ? `: ${detail}` : ''}`, {
        status,
        family,
      });
    }

    if (parsedBody === undefined) {
      throw new TransportFailureError('Upstream returned a response that is not valid JSON', {
        family,
        status,
      });
    }

    const parsed = ApiSportsEnvelopeSchema.safeParse(parsedBody);
    if (!parsed.success) {
      throw new TransportFailureError('Upstream returned a malformed response envelope', {
        family,
        status,
      });
    }

    const envelope = parsed.data;
    if (hasErrors(envelope.errors)) {
      const window = this.quotaWindowFromErrors(envelope.errors);
      if (window) {
        throw new QuotaRejectedError(`Upstream quota exceeded: ${describeErrors(envelope.errors)}`, {
          window,
          status,
        });
      }
      throw new UpstreamError(`Upstream rejected the request: ${describeErrors(envelope.errors)}`, {
        status,
        family,
      });
    }

    return envelope;
  }

  private parseJson(body: string): unknown {
    if (body.trim() === '') {
      return undefined;
    }
    try {
      const value: unknown = JSON.parse(body);
      return value;
    } catch {
      return undefined;
    }
  }

  private quotaWindowFromBody(body: unknown): RateWindowKind | undefined {
    if (!isRecord(body)) {
      return undefined;
    }
    const errors = body['errors'];
    if (isRecord(errors) || Array.isArray(errors)) {
      return this.quotaWindowFromErrors(errors);
    }
    return undefined;
  }

  private quotaWindowFromErrors(errors: Record<string, unknown> | unknown[]): RateWindowKind | undefined {
    if (Array.isArray(errors)) {
      return undefined;
    }
    if ('requests' in errors) {
      return RateWindowKind.DAY;
    }
    if ('rateLimit' in errors) {
      return RateWindowKind.MINUTE;
    }
    return undefined;
  }

  private logRateLimitHeaders(response: Response, family: QueryFamily): void {
    const dailyRemaining = response.headers.get('x-ratelimit-requests-remaining');
    const minuteRemaining = response.headers.get('x-ratelimit-remaining');
    if (dailyRemaining !== null || minuteRemaining !== null) {
      this.logger?.debug(
        {
          family,
          dailyRemaining,
          dailyLimit: response.headers.get('x-ratelimit-requests-limit'),
          minuteRemaining,
          minuteLimit: response.headers.get('x-ratelimit-limit'),
        },
        'Upstream rate limit status'
      );
    }
  }
}
