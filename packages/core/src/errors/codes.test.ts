/**
 * Tests for error codes and WdkeeperError
 */

import { describe, expect, it } from 'vitest';
import {
  createErrorFromUnknown,
  ErrorCode,
  ErrorSeverity,
  getSystemErrorCode,
  isWdkeeperError,
  WdkeeperError
} from './codes.js';

describe('ErrorCode', () => {
  it('should have unique error codes', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should follow naming convention', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(code).toMatch(/^E_[A-Z]+(_[A-Z]+)*$/);
    }
  });

  it('should group lifecycle failures under E_SERVER_', () => {
    expect(ErrorCode.E_SERVER_EXECUTABLE_NOT_FOUND).toMatch(/^E_SERVER_/);
    expect(ErrorCode.E_SERVER_EXITED_EARLY).toMatch(/^E_SERVER_/);
    expect(ErrorCode.E_SERVER_START_TIMEOUT).toMatch(/^E_SERVER_/);
    expect(ErrorCode.E_SERVER_STOP_FAILED).toMatch(/^E_SERVER_/);
  });
});

describe('WdkeeperError', () => {
  it('should default to error severity and not recoverable', () => {
    const error = new WdkeeperError(ErrorCode.E_SERVER_START_TIMEOUT, 'too slow');

    expect(error.name).toBe('WdkeeperError');
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({});
    expect(error).toBeInstanceOf(Error);
  });

  it('should keep context and cause', () => {
    const cause = new Error('spawn appium ENOENT');
    const error = new WdkeeperError(ErrorCode.E_SERVER_EXECUTABLE_NOT_FOUND, 'not found', {
      context: { command: 'appium' },
      cause
    });

    expect(error.context.command).toBe('appium');
    expect(error.cause).toBe(cause);
  });

  it('should render code and message in toString', () => {
    const error = new WdkeeperError(ErrorCode.E_CONFIG_INVALID, 'port must be positive');
    expect(error.toString()).toBe('[E_CONFIG_INVALID] port must be positive');
  });

  it('should serialize without stack', () => {
    const error = new WdkeeperError(ErrorCode.E_SERVER_STOP_FAILED, 'EPERM', {
      severity: ErrorSeverity.WARNING,
      context: { pid: 42 },
      recoverable: true
    });

    expect(error.toJSON()).toEqual({
      code: 'E_SERVER_STOP_FAILED',
      message: 'EPERM',
      severity: 'warning',
      recoverable: true,
      context: { pid: 42 }
    });
  });
});

describe('createErrorFromUnknown', () => {
  it('should return WdkeeperError unchanged', () => {
    const original = new WdkeeperError(ErrorCode.E_PROBE_FAILED, 'refused');
    expect(createErrorFromUnknown(original, ErrorCode.E_SYSTEM_UNKNOWN)).toBe(original);
  });

  it('should wrap native errors with the given code', () => {
    const native = new Error('kill EPERM');
    const wrapped = createErrorFromUnknown(native, ErrorCode.E_SERVER_STOP_FAILED, { pid: 7 });

    expect(isWdkeeperError(wrapped)).toBe(true);
    expect(wrapped.code).toBe(ErrorCode.E_SERVER_STOP_FAILED);
    expect(wrapped.message).toBe('kill EPERM');
    expect(wrapped.context).toEqual({ pid: 7 });
    expect(wrapped.cause).toBe(native);
  });

  it('should stringify non-error values', () => {
    const wrapped = createErrorFromUnknown('boom');
    expect(wrapped.code).toBe(ErrorCode.E_SYSTEM_UNKNOWN);
    expect(wrapped.message).toBe('boom');
  });
});

describe('getSystemErrorCode', () => {
  it('should read string codes from system errors', () => {
    const error = Object.assign(new Error('spawn appium ENOENT'), { code: 'ENOENT' });
    expect(getSystemErrorCode(error)).toBe('ENOENT');
  });

  it('should ignore values without a string code', () => {
    expect(getSystemErrorCode(new Error('plain'))).toBeUndefined();
    expect(getSystemErrorCode({ code: 1 })).toBeUndefined();
    expect(getSystemErrorCode(null)).toBeUndefined();
  });
});
