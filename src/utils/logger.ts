/**
 * Logging with Pino - the API token is redacted
 */

import pino from 'pino';

// EnvConfig carries the token as apiToken
export const REDACT_PATHS = ['apiToken', 'config.apiToken'];
export const REDACT_CENSOR = '[REDACTED]';

function defaultLevel(): string {
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  redact: {
    paths: REDACT_PATHS,
    censor: REDACT_CENSOR,
  },
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
