import path from 'path';
import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../../../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.environment).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.cache).toEqual({ maxSize: 1000, defaultTtlMs: 3_600_000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 5, recoveryTimeoutMs: 60_000 });
    expect(config.retry).toEqual({ maxRetries: 3, initialDelayMs: 2_000, maxDelayMs: 10_000, backoffBase: 2 });
    expect(config.rateLimit).toEqual({ requestsPerWindow: 10, windowMs: 60_000 });
    expect(config.tasks).toEqual({ maxAgeMinutes: 60, keepaliveMs: 30_000 });
    expect(config.maintenance).toEqual({ schedule: '*/5 * * * *' });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      RATE_LIMIT_REQUESTS_PER_MINUTE: '25',
      RETRY_MAX_RETRIES: '5',
      BREAKER_RECOVERY_TIMEOUT_MS: '30000',
    });

    expect(config.rateLimit.requestsPerWindow).toBe(25);
    expect(config.retry.maxRetries).toBe(5);
    expect(config.circuitBreaker.recoveryTimeoutMs).toBe(30_000);
  });

  it('should prefer SERVICE_NAME and resolve a relative logs directory', () => {
    const config = loadConfig({ SERVICE_NAME: 'research-test', LOGS_DIR: 'tmp-logs' });

    expect(config.serviceName).toBe('research-test');
    expect(config.logsPath).toBe(path.resolve(process.cwd(), 'tmp-logs'));
  });

  it('should fall back to defaults when a variable is invalid', () => {
    const config = loadConfig({ CACHE_MAX_SIZE: 'lots', LOG_LEVEL: 'debug' });

    expect(config.cache.maxSize).toBe(1000);
    expect(config.logLevel).toBe('info');
  });
});
