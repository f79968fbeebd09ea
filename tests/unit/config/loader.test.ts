import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  applyEnvOverrides,
  getConfig,
  getMediatorConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import type { Config } from '../../../src/config/loader.js';

describe('Config Loader', () => {
  let testConfigDir: string;
  let testConfigPath: string;

  const validConfig: Config = {
    api_sports: {
      api_key: 'test-secret',
      base_url: 'https://sports.example.test',
      timeout_ms: 30000,
    },
    rate_limit: {
      calls_per_minute: 10,
      calls_per_day: 100,
      max_admission_wait_ms: 120000,
      base_backoff_ms: 1000,
      max_backoff_ms: 60000,
      jitter: 0.2,
    },
    cache: {
      enabled: true,
      max_entries: 500,
      ttl_long_ms: 86400000,
      ttl_medium_ms: 3600000,
      purge_interval_ms: 300000,
    },
    transport_retry: {
      max_attempts: 3,
      initial_delay_ms: 500,
      max_delay_ms: 4000,
      backoff_multiplier: 2,
    },
    logging: {
      level: 'info',
    },
  };

  const writeConfig = (contents: unknown): void => {
    writeFileSync(testConfigPath, yaml.dump(contents), 'utf8');
  };

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'mediator-config-'));
    testConfigPath = join(testConfigDir, 'runtime.yaml');
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    resetConfig();
  });

  describe('loadConfig', () => {
    it('loads the YAML file as-is without environment sections', () => {
      writeConfig(validConfig);

      expect(loadConfig(testConfigPath, 'development', {})).toEqual(validConfig);
    });

    it('deep-merges the selected environment section', () => {
      writeConfig({
        ...validConfig,
        environments: {
          production: { rate_limit: { calls_per_minute: 300, calls_per_day: 7500 } },
          test: { logging: { level: 'silent' }, cache: { purge_interval_ms: 0 } },
        },
      });

      const config = loadConfig(testConfigPath, 'test', {});

      expect(config).toEqual({
        ...validConfig,
        logging: { level: 'silent' },
        cache: { ...validConfig.cache, purge_interval_ms: 0 },
      });
      expect(config).not.toHaveProperty('environments');
    });

    it('selects the environment from NODE_ENV', () => {
      writeConfig({
        ...validConfig,
        environments: { production: { rate_limit: { calls_per_minute: 300, calls_per_day: 7500 } } },
      });

      const config = validateConfig(loadConfig(testConfigPath, undefined, { NODE_ENV: 'production' }));

      expect(config.rate_limit.calls_per_minute).toBe(300);
      expect(config.rate_limit.calls_per_day).toBe(7500);
    });

    it('applies environment variable overrides last', () => {
      writeConfig({
        ...validConfig,
        environments: { development: { logging: { level: 'debug' } } },
      });

      const config = validateConfig(
        loadConfig(testConfigPath, 'development', {
          API_SPORTS_API_KEY: 'override-secret',
          RATE_LIMIT_CALLS_PER_MINUTE: '5',
          CACHE_ENABLED: 'false',
          CACHE_MAX_SIZE: '50',
          LOG_LEVEL: 'warn',
        })
      );

      expect(config.api_sports.api_key).toBe('override-secret');
      expect(config.rate_limit.calls_per_minute).toBe(5);
      expect(config.cache.enabled).toBe(false);
      expect(config.cache.max_entries).toBe(50);
      expect(config.logging.level).toBe('warn');
    });

    it('throws a helpful error when the file is missing', () => {
      expect(() => loadConfig(join(testConfigDir, 'missing.yaml'))).toThrow(
        /Configuration file not found: .*missing\.yaml/
      );
    });

    it('rejects a file that is not a mapping', () => {
      writeFileSync(testConfigPath, '- just\n- a list\n', 'utf8');

      expect(() => loadConfig(testConfigPath)).toThrow('does not contain a mapping');
    });

    it('loads the bundled runtime.yaml', () => {
      const config = validateConfig(loadConfig(undefined, 'test', {}));

      expect(config.logging.level).toBe('silent');
      expect(config.api_sports.base_url).toBe('https://v3.football.api-sports.io');
      expect(config.cache.purge_interval_ms).toBe(0);
    });
  });

  describe('applyEnvOverrides', () => {
    it('leaves unparseable numbers for validation to report', () => {
      const raw = applyEnvOverrides({ ...validConfig }, { RATE_LIMIT_CALLS_PER_DAY: 'lots' });

      expect(() => validateConfig(raw)).toThrow('rate_limit.calls_per_day Expected number, received string');
    });

    it('ignores empty variables', () => {
      expect(applyEnvOverrides({ ...validConfig }, { LOG_LEVEL: '' })).toEqual(validConfig);
    });
  });

  describe('validateConfig', () => {
    it('accepts a valid configuration', () => {
      expect(validateConfig(validConfig)).toEqual(validConfig);
    });

    it('rejects a backoff cap below the base delay', () => {
      expect(() =>
        validateConfig({
          ...validConfig,
          rate_limit: { ...validConfig.rate_limit, base_backoff_ms: 5000, max_backoff_ms: 1000 },
        })
      ).toThrow('rate_limit.max_backoff_ms must be >= base_backoff_ms');
    });

    it('rejects a daily limit below the per-minute limit', () => {
      expect(() =>
        validateConfig({
          ...validConfig,
          rate_limit: { ...validConfig.rate_limit, calls_per_minute: 50, calls_per_day: 10 },
        })
      ).toThrow('rate_limit.calls_per_day must be >= calls_per_minute');
    });

    it('lists every issue', () => {
      const invalid = {
        ...validConfig,
        cache: { ...validConfig.cache, max_entries: 0 },
        rate_limit: { ...validConfig.rate_limit, jitter: 2 },
      };

      expect(() => validateConfig(invalid)).toThrow(
        'Configuration validation failed:\nrate_limit.jitter must be 0-1\ncache.max_entries must be >= 1'
      );
    });
  });

  describe('global configuration', () => {
    it('initializes once and returns the cached instance', () => {
      writeConfig(validConfig);

      const first = initializeConfig(testConfigPath, 'development');

      expect(getConfig()).toBe(first);
    });
  });

  describe('getMediatorConfig', () => {
    it('converts snake_case to component settings', () => {
      expect(getMediatorConfig(validConfig)).toEqual({
        client: {
          apiKey: 'test-secret',
          baseUrl: 'https://sports.example.test',
          timeoutMs: 30000,
        },
        rateLimiter: {
          callsPerMinute: 10,
          callsPerDay: 100,
          maxAdmissionWaitMs: 120000,
          baseBackoffMs: 1000,
          maxBackoffMs: 60000,
          jitter: 0.2,
        },
        cache: {
          enabled: true,
          maxEntries: 500,
          longTtlMs: 86400000,
          mediumTtlMs: 3600000,
          purgeIntervalMs: 300000,
        },
        transportRetry: {
          maxAttempts: 3,
          initialDelayMs: 500,
          maxDelayMs: 4000,
          backoffMultiplier: 2,
        },
        logLevel: 'info',
      });
    });
  });
});
