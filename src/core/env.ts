/**
 * Environment variable handling with validation
 * The API token is never logged or exposed
 */

export interface EnvConfig {
  apiToken: string;
  databaseId: string;
  pointsPerLevel: number;
  cacheTtlSeconds: number;
  xpProperty: string;
  widgetTitle: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

export const DEFAULT_POINTS_PER_LEVEL = 200;
export const DEFAULT_CACHE_TTL_SECONDS = 120;
export const DEFAULT_XP_PROPERTY = 'XP';
export const DEFAULT_WIDGET_TITLE = 'Level progress';

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value || undefined;
}

function getRequiredEnvVar(name: string): string {
  const value = getEnvVar(name);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${name}`, name);
  }
  return value;
}

function getIntEnvVar(name: string, fallback: number, min: number): number {
  const raw = getEnvVar(name);
  if (raw === undefined) return fallback;

  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`Environment variable ${name} must be an integer, got "${raw}"`, name);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`Environment variable ${name} must be >= ${min}, got ${raw}`, name);
  }
  return value;
}

function isLogLevel(value: string): value is EnvConfig['logLevel'] {
  return ['debug', 'info', 'warn', 'error'].includes(value);
}

function isNodeEnv(value: string): value is EnvConfig['nodeEnv'] {
  return ['development', 'production', 'test'].includes(value);
}

export function loadEnvConfig(): EnvConfig {
  const apiToken = getRequiredEnvVar('API_TOKEN');
  const databaseId = getRequiredEnvVar('DATABASE_ID');

  const logLevelRaw = getEnvVar('LOG_LEVEL') || 'info';
  const logLevel = isLogLevel(logLevelRaw) ? logLevelRaw : 'info';

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  const nodeEnv = isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development';

  return {
    apiToken,
    databaseId,
    // divisor for every level computation
    pointsPerLevel: getIntEnvVar('POINTS_PER_LEVEL', DEFAULT_POINTS_PER_LEVEL, 1),
    cacheTtlSeconds: getIntEnvVar('CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS, 0),
    xpProperty: getEnvVar('XP_PROPERTY') ?? DEFAULT_XP_PROPERTY,
    widgetTitle: getEnvVar('WIDGET_TITLE') ?? DEFAULT_WIDGET_TITLE,
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
