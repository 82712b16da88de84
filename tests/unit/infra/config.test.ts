/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.METRICS_API_BASE_URL).toBe('https://dashboard.nregsmp.org');
      expect(env.METRICS_FETCH_CONCURRENCY).toBe(1);
      expect(env.METRICS_API_TIMEOUT_MS).toBeUndefined();
      expect(env.REPORT_MODEL).toBe('gpt-4o');
      expect(env.REPORT_MAX_TOKENS).toBe(16000);
      expect(env.REPORT_OUTPUT_DIR).toBe('output');
      expect(env.OPENAI_API_KEY).toBeUndefined();
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ PORT: '8080' });

      expect(env.PORT).toBe(8080);
      expect(typeof env.PORT).toBe('number');
    });

    it('accepts valid NODE_ENV values', () => {
      expect(parseEnv({ NODE_ENV: 'development' }).NODE_ENV).toBe('development');
      expect(parseEnv({ NODE_ENV: 'production' }).NODE_ENV).toBe('production');
      expect(parseEnv({ NODE_ENV: 'test' }).NODE_ENV).toBe('test');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('parses metrics API settings', () => {
      const env = parseEnv({
        METRICS_API_BASE_URL: 'https://metrics.test',
        METRICS_API_KEY: 'test-secret',
        METRICS_API_TIMEOUT_MS: '2500',
        METRICS_FETCH_CONCURRENCY: '4',
      });

      expect(env.METRICS_API_BASE_URL).toBe('https://metrics.test');
      expect(env.METRICS_API_KEY).toBe('test-secret');
      expect(env.METRICS_API_TIMEOUT_MS).toBe(2500);
      expect(env.METRICS_FETCH_CONCURRENCY).toBe(4);
    });

    it('treats an empty timeout as unset', () => {
      expect(parseEnv({ METRICS_API_TIMEOUT_MS: '' }).METRICS_API_TIMEOUT_MS).toBeUndefined();
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ PORT: 'invalid' })).toThrow('Invalid environment configuration');
    });

    it('throws when fetch concurrency is out of range', () => {
      expect(() => parseEnv({ METRICS_FETCH_CONCURRENCY: '0' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ METRICS_FETCH_CONCURRENCY: '16' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on an unknown LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(
        'Invalid environment configuration'
      );
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.server.isProduction).toBe(false);
      expect(devConfig.server.isTest).toBe(false);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.server.isDevelopment).toBe(false);
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.server.isTest).toBe(false);

      const testConfig = createConfig(parseEnv({ NODE_ENV: 'test' }));
      expect(testConfig.server.isDevelopment).toBe(false);
      expect(testConfig.server.isProduction).toBe(false);
      expect(testConfig.server.isTest).toBe(true);
    });

    it('sets pretty logging for non-production', () => {
      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.logger.pretty).toBe(true);

      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.logger.pretty).toBe(false);
    });

    it('passes through port and host', () => {
      const config = createConfig(parseEnv({ PORT: '8080', HOST: '127.0.0.1' }));

      expect(config.server.port).toBe(8080);
      expect(config.server.host).toBe('127.0.0.1');
    });

    it('strips trailing slashes from the metrics base URL', () => {
      const config = createConfig(parseEnv({ METRICS_API_BASE_URL: 'https://metrics.test//' }));

      expect(config.metrics.baseUrl).toBe('https://metrics.test');
    });

    it('groups report settings', () => {
      const config = createConfig(
        parseEnv({ OPENAI_API_KEY: 'test-secret', REPORT_OUTPUT_DIR: '/tmp/reports' })
      );

      expect(config.report).toEqual({
        openaiApiKey: 'test-secret',
        model: 'gpt-4o',
        maxTokens: 16000,
        outputDir: '/tmp/reports',
      });
    });
  });
});
