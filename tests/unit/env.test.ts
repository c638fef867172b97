import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  getEnvConfig,
  loadEnvConfig,
  resetEnvConfig,
} from '@/core/env';
import { register } from '@/instrumentation';

const KEYS = [
  'API_TOKEN',
  'DATABASE_ID',
  'POINTS_PER_LEVEL',
  'CACHE_TTL_SECONDS',
  'XP_PROPERTY',
  'WIDGET_TITLE',
  'LOG_LEVEL',
  'NEXT_RUNTIME',
] as const;

const originalEnv: Record<string, string | undefined> = {};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('environment config', () => {
  beforeEach(() => {
    KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
    process.env.API_TOKEN = 'test-secret';
    process.env.DATABASE_ID = 'db-123';
    resetEnvConfig();
  });

  afterEach(() => {
    resetEnvConfig();
    KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('applies defaults for optional variables', () => {
    const config = loadEnvConfig();
    expect(config.apiToken).toBe('test-secret');
    expect(config.databaseId).toBe('db-123');
    expect(config.pointsPerLevel).toBe(200);
    expect(config.cacheTtlSeconds).toBe(120);
    expect(config.xpProperty).toBe('XP');
    expect(config.widgetTitle).toBe('Level progress');
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides', () => {
    process.env.POINTS_PER_LEVEL = '500';
    process.env.CACHE_TTL_SECONDS = '0';
    process.env.XP_PROPERTY = 'Points';
    process.env.WIDGET_TITLE = 'Morning routine';
    process.env.LOG_LEVEL = 'debug';

    const config = loadEnvConfig();
    expect(config.pointsPerLevel).toBe(500);
    expect(config.cacheTtlSeconds).toBe(0);
    expect(config.xpProperty).toBe('Points');
    expect(config.widgetTitle).toBe('Morning routine');
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a missing API token', () => {
    delete process.env.API_TOKEN;
    const error = captureError(() => loadEnvConfig());
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      variable: 'API_TOKEN',
      message: 'Missing required environment variable: API_TOKEN',
    });
  });

  it('treats a blank database id as missing', () => {
    process.env.DATABASE_ID = '   ';
    expect(() => loadEnvConfig()).toThrow('Missing required environment variable: DATABASE_ID');
  });

  it('rejects a zero points-per-level', () => {
    process.env.POINTS_PER_LEVEL = '0';
    expect(() => loadEnvConfig()).toThrow('Environment variable POINTS_PER_LEVEL must be >= 1, got 0');
  });

  it('rejects non-integer numeric settings', () => {
    process.env.CACHE_TTL_SECONDS = '1.5';
    expect(() => loadEnvConfig()).toThrow(
      'Environment variable CACHE_TTL_SECONDS must be an integer, got "1.5"'
    );
  });

  it('falls back to info for an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(loadEnvConfig().logLevel).toBe('info');
  });

  it('memoises until reset', () => {
    const first = getEnvConfig();
    process.env.POINTS_PER_LEVEL = '300';
    expect(getEnvConfig()).toBe(first);

    resetEnvConfig();
    expect(getEnvConfig().pointsPerLevel).toBe(300);
  });

  it('aborts server startup when required config is missing', async () => {
    process.env.NEXT_RUNTIME = 'nodejs';
    delete process.env.DATABASE_ID;
    await expect(register()).rejects.toBeInstanceOf(ConfigError);
  });

  it('skips startup validation outside the node runtime', async () => {
    process.env.NEXT_RUNTIME = 'edge';
    delete process.env.API_TOKEN;
    await expect(register()).resolves.toBeUndefined();
  });
});
