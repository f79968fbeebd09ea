/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides,
 * then applies environment variables on top.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { LogLevel, RuntimeConfig } from '../types/schemas/config.js';
import { RuntimeConfigSchema } from '../types/schemas/config.js';

export type Config = RuntimeConfig;

export type Environment = 'production' | 'development' | 'test';

/**
 * Parsed YAML before validation
 */
export type RawConfig = Record<string, unknown>;

/**
 * Component settings in the shape the constructors take (camelCase)
 */
export interface MediatorSettings {
  client: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  rateLimiter: {
    callsPerMinute: number;
    callsPerDay: number;
    maxAdmissionWaitMs: number;
    baseBackoffMs: number;
    maxBackoffMs: number;
    jitter: number;
  };
  cache: {
    enabled: boolean;
    maxEntries: number;
    longTtlMs: number;
    mediumTtlMs: number;
    purgeIntervalMs: number;
  };
  transportRetry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
  logLevel: LogLevel;
}

type OverrideKind = 'string' | 'integer' | 'boolean';

/**
 * Environment variables and the config paths they override
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; path: [string, string]; kind: OverrideKind }> = [
  { variable: 'API_SPORTS_API_KEY', path: ['api_sports', 'api_key'], kind: 'string' },
  { variable: 'API_SPORTS_BASE_URL', path: ['api_sports', 'base_url'], kind: 'string' },
  { variable: 'RATE_LIMIT_CALLS_PER_MINUTE', path: ['rate_limit', 'calls_per_minute'], kind: 'integer' },
  { variable: 'RATE_LIMIT_CALLS_PER_DAY', path: ['rate_limit', 'calls_per_day'], kind: 'integer' },
  { variable: 'CACHE_ENABLED', path: ['cache', 'enabled'], kind: 'boolean' },
  { variable: 'CACHE_MAX_SIZE', path: ['cache', 'max_entries'], kind: 'integer' },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'], kind: 'string' },
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const output: RawConfig = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Values that do not parse are passed through as strings so that
 * validation reports them against their field.
 */
function parseOverride(value: string, kind: OverrideKind): unknown {
  switch (kind) {
    case 'string':
      return value;
    case 'integer': {
      const parsed = Number(value.trim());
      return Number.isInteger(parsed) && value.trim() !== '' ? parsed : value;
    }
    case 'boolean': {
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      return value;
    }
  }
}

/**
 * Apply environment variable overrides to a raw config
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  let output = config;

  for (const { variable, path, kind } of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') {
      continue;
    }

    const [section, field] = path;
    output = deepMerge(output, { [section]: { [field]: parseOverride(value, kind) } });
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function readErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Load configuration from YAML file
 *
 * Returns the merged, unvalidated configuration; see validateConfig().
 */
export function loadConfig(
  configPath?: string,
  environment?: Environment,
  env: NodeJS.ProcessEnv = process.env
): RawConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let loaded: unknown;
  try {
    loaded = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (readErrorCode(error) === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration: ${message}`);
  }

  if (!isPlainObject(loaded)) {
    throw new Error(`Failed to load configuration: ${finalPath} does not contain a mapping`);
  }

  const { environments, ...baseConfig } = loaded;
  const envName = environment ?? env.NODE_ENV ?? 'development';
  const selected = envName === 'production' || envName === 'test' ? envName : 'development';

  let merged: RawConfig = baseConfig;
  if (isPlainObject(environments)) {
    const envConfig = environments[selected];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(baseConfig, envConfig);
    }
  }

  return applyEnvOverrides(merged, env);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML config (snake_case) to component settings (camelCase)
 */
export function getMediatorConfig(config: Config = getConfig()): MediatorSettings {
  return {
    client: {
      apiKey: config.api_sports.api_key,
      baseUrl: config.api_sports.base_url,
      timeoutMs: config.api_sports.timeout_ms,
    },
    rateLimiter: {
      callsPerMinute: config.rate_limit.calls_per_minute,
      callsPerDay: config.rate_limit.calls_per_day,
      maxAdmissionWaitMs: config.rate_limit.max_admission_wait_ms,
      baseBackoffMs: config.rate_limit.base_backoff_ms,
      maxBackoffMs: config.rate_limit.max_backoff_ms,
      jitter: config.rate_limit.jitter,
    },
    cache: {
      enabled: config.cache.enabled,
      maxEntries: config.cache.max_entries,
      longTtlMs: config.cache.ttl_long_ms,
      mediumTtlMs: config.cache.ttl_medium_ms,
      purgeIntervalMs: config.cache.purge_interval_ms,
    },
    transportRetry: {
      maxAttempts: config.transport_retry.max_attempts,
      initialDelayMs: config.transport_retry.initial_delay_ms,
      maxDelayMs: config.transport_retry.max_delay_ms,
      backoffMultiplier: config.transport_retry.backoff_multiplier,
    },
    logLevel: config.logging.level,
  };
}
