import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { REDACT_CENSOR, REDACT_PATHS } from '@/utils/logger';

describe('logger redaction', () => {
  it('masks the API token at the top level and inside a logged config', () => {
    const lines: string[] = [];
    const log = pino(
      { redact: { paths: REDACT_PATHS, censor: REDACT_CENSOR } },
      { write: (line: string) => lines.push(line) }
    );

    log.info({ apiToken: 'test-secret', config: { apiToken: 'test-secret', databaseId: 'db-123' } }, 'loaded');

    expect(JSON.parse(lines[0])).toMatchObject({
      apiToken: '[REDACTED]',
      config: { apiToken: '[REDACTED]', databaseId: 'db-123' },
      msg: 'loaded',
    });
  });
});
