import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SOURCES_FILE: 'sources.json',
      RPC_TIMEOUT_MS: 10000,
      CACHE_MAX_ENTRIES: 10000,
    });
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({
      RPC_TIMEOUT_MS: '2500',
      CACHE_MAX_ENTRIES: '50',
      LOCATION_CACHE_TTL_SECONDS: '28800',
    });

    expect(config.RPC_TIMEOUT_MS).toBe(2500);
    expect(config.CACHE_MAX_ENTRIES).toBe(50);
    expect(config.LOCATION_CACHE_TTL_SECONDS).toBe(28800);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ RPC_TIMEOUT_MS: 'soon' })).toThrow(/Invalid configuration: RPC_TIMEOUT_MS/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
