import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  createSilentLogger,
  formatLogMessage,
  isLogLevel,
  shouldLog
} from './logger.js';

describe('shouldLog', () => {
  it('should compare levels by severity', () => {
    expect(shouldLog('info', 'error')).toBe(true);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('info', 'debug')).toBe(false);
    expect(shouldLog('silent', 'error')).toBe(false);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('formatLogMessage', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should format a plain message', () => {
    expect(formatLogMessage('info', 'Automation server is running')).toBe(
      '[2024-01-01T12:00:00.000Z] [INFO] Automation server is running'
    );
  });

  it('should append data after the message', () => {
    expect(formatLogMessage('warn', { pid: 42 }, 'Force killing', '[manager]')).toBe(
      '[2024-01-01T12:00:00.000Z] [WARN] [manager] Force killing {"pid":42}'
    );
  });

  it('should serialize errors by name and message', () => {
    const error = Object.assign(new Error('spawn appium ENOENT'), { code: 'ENOENT' });
    expect(formatLogMessage('error', { error }, 'Launch failed')).toBe(
      '[2024-01-01T12:00:00.000Z] [ERROR] Launch failed {"error":{"name":"Error","message":"spawn appium ENOENT","code":"ENOENT"}}'
    );
  });

  it('should emit JSON records when json is set', () => {
    const line = formatLogMessage('info', { port: 4723 }, 'Started', '[cli]', true);
    expect(JSON.parse(line)).toEqual({
      time: '2024-01-01T12:00:00.000Z',
      level: 'info',
      prefix: '[cli]',
      msg: 'Started',
      data: { port: 4723 }
    });
  });
});

describe('createLogger', () => {
  it('should route messages at or above the level to output', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'warn', output });

    logger.error('bad');
    logger.warn('careful');
    logger.info('chatty');
    logger.debug('noisy');

    expect(output).toHaveBeenCalledTimes(2);
    expect(output.mock.calls[0]?.[0]).toContain('[ERROR] bad');
    expect(output.mock.calls[1]?.[0]).toContain('[WARN] careful');
  });

  it('should nest child prefixes', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'info', prefix: '[wdkeeper]', output });

    logger.child?.('manager').info('probing');

    expect(output.mock.calls[0]?.[0]).toContain('[wdkeeper][manager] probing');
  });

  it('should stay quiet when silent', () => {
    const logger = createSilentLogger();
    expect(logger.level).toBe('silent');
    expect(() => logger.error('ignored')).not.toThrow();
  });
});
