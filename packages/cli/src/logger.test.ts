import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { Logger } from './logger.js';

describe('Logger', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should write enabled levels to stderr', () => {
    const logger = new Logger('info', '', {});

    logger.info({ pid: 42 }, 'Automation server launched');
    logger.debug('hidden');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] Automation server launched \{"pid":42\}$/
    );
  });

  it('should let WDKEEPER_LOG_LEVEL override the configured level', () => {
    const logger = new Logger('error', '', { WDKEEPER_LOG_LEVEL: 'debug' });

    expect(logger.level).toBe('debug');
    logger.debug('visible');
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should ignore an unknown WDKEEPER_LOG_LEVEL', () => {
    const logger = new Logger('warn', '', { WDKEEPER_LOG_LEVEL: 'loud' });
    expect(logger.level).toBe('warn');
  });

  it('should emit JSON records when WDKEEPER_LOG=json', () => {
    const logger = new Logger('info', '', { WDKEEPER_LOG: 'json' });

    logger.warn({ gracePeriodMs: 100 }, 'Escalating');

    const record: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
    expect(record).toMatchObject({ level: 'warn', msg: 'Escalating', data: { gracePeriodMs: 100 } });
  });

  it('should prefix child loggers', () => {
    const child = new Logger('info', '', {}).child('lifecycle');

    child.info('ready');

    expect(errorSpy.mock.calls[0]?.[0]).toMatch(/\[INFO\] \[lifecycle\] ready$/);
  });
});
