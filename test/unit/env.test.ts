import { describe, it, expect } from 'vitest';
import { CLOUD_PLATFORM_SCOPE, GOOGLE_TOKEN_URL, loadConfig } from '../../src/config/env.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('debug');
    expect(config.apiKey).toBe('');
    expect(config.serviceAccountJson).toBe('');
    expect(config.tokenUrl).toBe(GOOGLE_TOKEN_URL);
    expect(config.probeUrl).toBeNull();
    expect(config.scopes).toEqual([CLOUD_PLATFORM_SCOPE]);
    expect(config.tokenCacheMarginMs).toBe(300000);
    expect(config.mintTimeoutMs).toBe(10000);
    expect(config.probeTimeoutMs).toBe(3000);
    expect(config.probeIntervalMs).toBe(30000);
    expect(config.health).toEqual({
      unhealthyConsecutiveFailures: 5,
      minRequestsForRate: 10,
      unhealthySuccessRate: 0.5,
      degradedSuccessRate: 0.8,
      livenessGraceMs: 300000,
    });
    expect(config.shutdownTimeoutMs).toBe(25000);
    expect(config.forceShutdownTimeoutMs).toBe(30000);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9090',
      NODE_ENV: 'production',
      API_KEY: 'test-secret',
      GOOGLE_TOKEN_URL: 'https://oauth2.test.local/token',
      TOKEN_SCOPES: 'scope-a, scope-b  scope-c',
      TOKEN_CACHE_MARGIN_MS: '60000',
      HEALTH_UNHEALTHY_CONSECUTIVE_FAILURES: '3',
      LIVENESS_GRACE_MS: '1000',
    });

    expect(config.port).toBe(9090);
    expect(config.logLevel).toBe('info');
    expect(config.apiKey).toBe('test-secret');
    expect(config.tokenUrl).toBe('https://oauth2.test.local/token');
    expect(config.probeUrl).toBeNull();
    expect(config.scopes).toEqual(['scope-a', 'scope-b', 'scope-c']);
    expect(config.tokenCacheMarginMs).toBe(60000);
    expect(config.health.unhealthyConsecutiveFailures).toBe(3);
    expect(config.health.livenessGraceMs).toBe(1000);
  });

  it('should take an explicit probe URL', () => {
    expect(loadConfig({ PROBE_URL: 'https://probe.test.local/' }).probeUrl).toBe('https://probe.test.local/');
  });

  it('should keep defaults for unparseable numbers', () => {
    const config = loadConfig({ MINT_TIMEOUT_MS: 'soon', PROBE_TIMEOUT_MS: ' ' });

    expect(config.mintTimeoutMs).toBe(10000);
    expect(config.probeTimeoutMs).toBe(3000);
  });

  it('should stay silent under test unless told otherwise', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });
});
