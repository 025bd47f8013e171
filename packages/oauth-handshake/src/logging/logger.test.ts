import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createConsoleLogger, createMemoryLogger, noopLogger } from './logger.js';

const spyOnStderr = () => vi.spyOn(console, 'error').mockImplementation(() => undefined);

describe('createConsoleLogger', () => {
  let stderr: ReturnType<typeof spyOnStderr>;

  beforeEach(() => {
    stderr = spyOnStderr();
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  describe('given an info entry with context', () => {
    it('writes a prefixed line to stderr', () => {
      const logger = createConsoleLogger('oauth1');

      logger.info('Request token issued', { status: 200 });

      expect(stderr).toHaveBeenCalledWith('[oauth1] Request token issued status=200');
    });
  });

  describe('given an entry below the threshold', () => {
    it('writes nothing', () => {
      const logger = createConsoleLogger('oauth1');

      logger.debug('attempt started');

      expect(stderr).not.toHaveBeenCalled();
    });
  });

  describe('given a child logger', () => {
    it('merges parent context and drops undefined values', () => {
      const logger = createConsoleLogger('exchange', { level: 'debug' }).child({ flow: 'oauth2' });

      logger.debug('start', { attempt: 1, status: undefined });

      expect(stderr).toHaveBeenCalledWith('[exchange] start flow=oauth2 attempt=1');
    });
  });
});

describe('createMemoryLogger', () => {
  it('records entries from parent and children in one list', () => {
    const logger = createMemoryLogger({ flow: 'oauth1' });

    logger.info('one');
    logger.child({ attempt: 2 }).warn('two');

    expect(logger.entries).toEqual([
      { level: 'info', message: 'one', context: { flow: 'oauth1' } },
      { level: 'warn', message: 'two', context: { flow: 'oauth1', attempt: 2 } },
    ]);
  });
});

describe('noopLogger', () => {
  it('returns itself as child', () => {
    expect(noopLogger.child({ flow: 'x' })).toBe(noopLogger);
  });
});
