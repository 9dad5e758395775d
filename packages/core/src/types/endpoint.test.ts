import { describe, expect, it } from 'vitest';
import { ErrorCode, WdkeeperError } from '../errors/index.js';
import {
  createEndpoint,
  getBaseUrl,
  getHealthCheckUrls,
  isLoopbackHost,
  normalizeBasePath
} from './endpoint.js';

describe('createEndpoint', () => {
  it('should freeze the endpoint', () => {
    const endpoint = createEndpoint('localhost', 4723);
    expect(endpoint).toEqual({ host: 'localhost', port: 4723 });
    expect(Object.isFrozen(endpoint)).toBe(true);
  });

  it('should trim the host', () => {
    expect(createEndpoint('  10.0.0.5 ', 4723).host).toBe('10.0.0.5');
  });

  it.each([0, -1, 65536, 4723.5, Number.NaN])('should reject port %s', (port) => {
    expect(() => createEndpoint('localhost', port)).toThrow(WdkeeperError);
  });

  it('should reject an empty host with E_CONFIG_INVALID', () => {
    try {
      createEndpoint('   ', 4723);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(WdkeeperError);
      expect((error as WdkeeperError).code).toBe(ErrorCode.E_CONFIG_INVALID);
    }
  });
});

describe('isLoopbackHost', () => {
  it('should accept loopback aliases', () => {
    expect(isLoopbackHost('localhost')).toBe(true);
    expect(isLoopbackHost('LOCALHOST')).toBe(true);
    expect(isLoopbackHost('127.0.0.1')).toBe(true);
    expect(isLoopbackHost('::1')).toBe(true);
  });

  it('should reject other hosts', () => {
    expect(isLoopbackHost('0.0.0.0')).toBe(false);
    expect(isLoopbackHost('192.168.1.20')).toBe(false);
    expect(isLoopbackHost('device-farm.local')).toBe(false);
  });
});

describe('getBaseUrl', () => {
  it('should build http URL from host and port', () => {
    expect(getBaseUrl(createEndpoint('localhost', 4723))).toBe('http://localhost:4723');
  });

  it('should bracket IPv6 literals', () => {
    expect(getBaseUrl(createEndpoint('::1', 4723))).toBe('http://[::1]:4723');
  });
});

describe('normalizeBasePath', () => {
  it.each([
    ['/wd/hub', '/wd/hub'],
    ['wd/hub', '/wd/hub'],
    ['/wd/hub/', '/wd/hub'],
    ['/', ''],
    ['', '']
  ])('should normalize %j to %j', (input, expected) => {
    expect(normalizeBasePath(input)).toBe(expected);
  });
});

describe('getHealthCheckUrls', () => {
  it('should order protocol status, generic status, then sessions', () => {
    expect(getHealthCheckUrls(createEndpoint('localhost', 4723))).toEqual([
      'http://localhost:4723/wd/hub/status',
      'http://localhost:4723/status',
      'http://localhost:4723/wd/hub/sessions'
    ]);
  });

  it('should drop the duplicate status URL for a root base path', () => {
    expect(getHealthCheckUrls(createEndpoint('127.0.0.1', 4444), '/')).toEqual([
      'http://127.0.0.1:4444/status',
      'http://127.0.0.1:4444/sessions'
    ]);
  });
});
