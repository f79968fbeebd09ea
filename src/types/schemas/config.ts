/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml after environment overrides are
 * applied.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const ApiSportsConfigSchema = z.object({
  api_key: z.string(),
  base_url: z.string().url('must be a valid URL'),
  timeout_ms: z.number().int().positive('must be positive'),
});

export const RateLimitConfigSchema = z
  .object({
    calls_per_minute: z.number().int().min(1, 'must be >= 1'),
    calls_per_day: z.number().int().min(1, 'must be >= 1'),
    max_admission_wait_ms: z.number().int().min(0, 'must be >= 0'),
    base_backoff_ms: z.number().int().positive('must be positive'),
    max_backoff_ms: z.number().int().positive('must be positive'),
    jitter: z.number().min(0).max(1, 'must be 0-1'),
  })
  .refine((data) => data.max_backoff_ms >= data.base_backoff_ms, {
    message: 'must be >= base_backoff_ms',
    path: ['max_backoff_ms'],
  })
  .refine((data) => data.calls_per_day >= data.calls_per_minute, {
    message: 'must be >= calls_per_minute',
    path: ['calls_per_day'],
  });

export const CacheConfigSchema = z.object({
  enabled: z.boolean(),
  max_entries: z.number().int().min(1, 'must be >= 1'),
  ttl_long_ms: z.number().int().positive('must be positive'),
  ttl_medium_ms: z.number().int().positive('must be positive'),
  purge_interval_ms: z.number().int().min(0, 'must be >= 0'),
});

export const TransportRetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1, 'must be >= 1'),
    initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
    max_delay_ms: z.number().int().min(0, 'must be >= 0'),
    backoff_multiplier: z.number().min(1, 'must be >= 1'),
  })
  .refine((data) => data.max_delay_ms >= data.initial_delay_ms, {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  });

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const RuntimeConfigSchema = z.object({
  api_sports: ApiSportsConfigSchema,
  rate_limit: RateLimitConfigSchema,
  cache: CacheConfigSchema,
  transport_retry: TransportRetryConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
