import { describe, it, expect } from 'vitest';
import { createConsoleLogger, formatLogLine } from '@banksync/types';

describe('formatLogLine', () => {
  it('should tag the level and scope', () => {
    expect(formatLogLine('info', 'Connection synced', 'sync', { added: 2 })).toBe(
      '[INFO] sync: Connection synced {"added":2}'
    );
  });

  it('should omit an empty context and a missing scope', () => {
    expect(formatLogLine('warn', 'hello', undefined, {})).toBe('[WARN] hello');
  });

  it('should serialize errors by name and message', () => {
    expect(formatLogLine('error', 'failed', undefined, { error: new Error('boom') })).toBe(
      '[ERROR] failed {"error":{"name":"Error","message":"boom"}}'
    );
  });
});

describe('createConsoleLogger', () => {
  it('should drop messages below the level threshold', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ scope: 'api', level: 'warn', write: (line) => lines.push(line) });

    logger.debug('noise');
    logger.info('still noise');
    logger.warn('careful');
    logger.error('broken', { code: 'E1' });

    expect(lines).toEqual(['[WARN] api: careful', '[ERROR] api: broken {"code":"E1"}']);
  });
});
