/**
 * Tests for configuration resolution and the builder.
 */

import { describe, it, expect } from 'vitest';
import {
  ClientConfigBuilder,
  ConfigurationError,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_TIMEOUT_MS,
  SecretString,
  resolveConfig,
} from '../index.js';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({ baseUrl: 'https://api.example.com' });
    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.maxRetries).toBe(3);
    expect(config.rateLimit).toEqual({ callsPerPeriod: 100, periodMs: 60000, burstMultiplier: 1 });
    expect(config.cache).toEqual(DEFAULT_CACHE_CONFIG);
    expect(config.retry).toEqual(DEFAULT_RETRY_CONFIG);
    expect(config.credential).toBeUndefined();
  });

  it('should strip trailing slashes from the base URL', () => {
    expect(resolveConfig({ baseUrl: 'https://api.example.com/v1/' }).baseUrl).toBe('https://api.example.com/v1');
  });

  it('should merge partial sections over the defaults', () => {
    const config = resolveConfig({
      baseUrl: 'http://localhost:8080',
      rateLimit: { callsPerPeriod: 5 },
      cache: { enabled: false },
    });
    expect(config.rateLimit.callsPerPeriod).toBe(5);
    expect(config.rateLimit.periodMs).toBe(60000);
    expect(config.cache.enabled).toBe(false);
    expect(config.cache.ttlMs).toBe(3600000);
  });

  it('should wrap the credential in a SecretString', () => {
    const config = resolveConfig({ baseUrl: 'https://api.example.com', credential: 'test-secret' });
    expect(config.credential).toBeInstanceOf(SecretString);
    expect(config.credential?.expose()).toBe('test-secret');
    expect(String(config.credential)).toBe('[REDACTED]');
    expect(JSON.stringify({ credential: config.credential })).toBe('{"credential":"[REDACTED]"}');
  });

  it('should reject a non-http scheme', () => {
    expect(() => resolveConfig({ baseUrl: 'ftp://files.example.com' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ baseUrl: 'ftp://files.example.com' })).toThrow(
      "baseUrl: Invalid URL scheme 'ftp'. Only http/https allowed"
    );
  });

  it('should reject unparsable and empty base URLs', () => {
    expect(() => resolveConfig({ baseUrl: 'not a url' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ baseUrl: '' })).toThrow(ConfigurationError);
  });

  it('should reject a base URL with a query string', () => {
    expect(() => resolveConfig({ baseUrl: 'https://api.example.com?key=1' })).toThrow(
      'Base URL must not contain a query string or fragment'
    );
  });

  it('should reject non-positive numeric settings', () => {
    expect(() => resolveConfig({ baseUrl: 'https://api.example.com', timeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ baseUrl: 'https://api.example.com', maxRetries: 0 })).toThrow(ConfigurationError);
    expect(() =>
      resolveConfig({ baseUrl: 'https://api.example.com', rateLimit: { periodMs: -1 } })
    ).toThrow('rateLimit.periodMs');
    expect(() => resolveConfig({ baseUrl: 'https://api.example.com', cache: { maxSize: 0 } })).toThrow(
      'cache.maxSize'
    );
  });

  it('should reject an empty credential', () => {
    expect(() => resolveConfig({ baseUrl: 'https://api.example.com', credential: '  ' })).toThrow(
      'Configuration error: Credential cannot be empty'
    );
  });
});

describe('ClientConfigBuilder', () => {
  it('should build a configuration fluently', () => {
    const config = new ClientConfigBuilder('https://api.example.com')
      .withCredential('test-secret')
      .withTimeout(5000)
      .withMaxRetries(5)
      .withRateLimit({ callsPerPeriod: 10, periodMs: 1000 })
      .withRetry({ baseDelayMs: 100 })
      .withUserAgent('weather-app/1.0')
      .withHeader('X-Client', 'tests')
      .withoutCache()
      .build();

    expect(config.timeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(5);
    expect(config.rateLimit).toEqual({ callsPerPeriod: 10, periodMs: 1000, burstMultiplier: 1 });
    expect(config.retry.baseDelayMs).toBe(100);
    expect(config.retry.maxDelayMs).toBe(30000);
    expect(config.userAgent).toBe('weather-app/1.0');
    expect(config.defaultHeaders).toEqual({ 'X-Client': 'tests' });
    expect(config.cache.enabled).toBe(false);
    expect(config.credential?.expose()).toBe('test-secret');
  });

  it('should keep the cache disabled when later settings are merged', () => {
    const config = new ClientConfigBuilder('https://api.example.com')
      .withoutCache()
      .withCache({ ttlMs: 1000 })
      .build();

    expect(config.cache).toEqual({ enabled: false, ttlMs: 1000, maxSize: 1000, cleanupIntervalMs: 300000 });
  });

  it('should re-enable the cache only when asked', () => {
    const config = new ClientConfigBuilder('https://api.example.com')
      .withoutCache()
      .withCache({ enabled: true })
      .build();

    expect(config.cache.enabled).toBe(true);
  });

  it('should fail to build without a base URL', () => {
    expect(() => new ClientConfigBuilder().build()).toThrow(ConfigurationError);
  });

  describe('fromEnv', () => {
    it('should read prefixed variables', () => {
      const config = ClientConfigBuilder.fromEnv({
        API_CLIENT_BASE_URL: 'https://maps.example.com',
        API_CLIENT_API_KEY: 'test-secret',
        API_CLIENT_TIMEOUT_MS: '1500',
        API_CLIENT_MAX_RETRIES: '4',
        API_CLIENT_RATE_LIMIT_CALLS: '20',
        API_CLIENT_RATE_LIMIT_PERIOD_MS: '1000',
        API_CLIENT_CACHE_TTL_MS: '60000',
        API_CLIENT_CACHE_MAX_SIZE: '50',
      }).build();

      expect(config.baseUrl).toBe('https://maps.example.com');
      expect(config.credential?.expose()).toBe('test-secret');
      expect(config.timeoutMs).toBe(1500);
      expect(config.maxRetries).toBe(4);
      expect(config.rateLimit.callsPerPeriod).toBe(20);
      expect(config.rateLimit.periodMs).toBe(1000);
      expect(config.cache).toEqual({ enabled: true, ttlMs: 60000, maxSize: 50, cleanupIntervalMs: 300000 });
    });

    it('should honour a custom prefix and ignore empty values', () => {
      const config = ClientConfigBuilder.fromEnv(
        { WEATHER_BASE_URL: 'http://localhost:9000', WEATHER_TIMEOUT_MS: '' },
        'WEATHER_'
      ).build();
      expect(config.baseUrl).toBe('http://localhost:9000');
      expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    });

    it('should disable the cache', () => {
      const config = ClientConfigBuilder.fromEnv({
        API_CLIENT_BASE_URL: 'https://api.example.com',
        API_CLIENT_CACHE_ENABLED: 'false',
        API_CLIENT_CACHE_TTL_MS: '60000',
      }).build();
      expect(config.cache.enabled).toBe(false);
      expect(config.cache.ttlMs).toBe(60000);
    });

    it('should reject malformed numbers', () => {
      expect(() =>
        ClientConfigBuilder.fromEnv({
          API_CLIENT_BASE_URL: 'https://api.example.com',
          API_CLIENT_TIMEOUT_MS: 'fast',
        })
      ).toThrow(ConfigurationError);
    });
  });
});
