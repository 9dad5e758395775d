import { ErrorCode } from '@wdkeeper/core';
import { fs, vol } from 'memfs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createCliContext } from './manager-factory.js';

vi.mock('node:fs', () => ({
  ...fs,
  default: fs
}));
vi.mock('node:fs/promises', () => ({
  ...fs.promises,
  default: fs.promises
}));

describe('createCliContext', () => {
  beforeEach(() => {
    vol.reset();
  });

  it('should build a manager from the configuration file', async () => {
    vol.fromJSON({
      '/cfg.json': JSON.stringify({
        logLevel: 'warn',
        server: { host: '127.0.0.1', port: 4800, command: 'appium2', timeouts: { startMs: 5000 } }
      })
    });

    const { manager, logger, config } = await createCliContext({ config: '/cfg.json' }, {});

    expect(config.exists).toBe(true);
    expect(logger.level).toBe('warn');
    expect(manager.url).toBe('http://127.0.0.1:4800');
    expect(manager.command).toBe('appium2');
    expect(manager.timeouts.startMs).toBe(5000);
    expect(manager.ownsProcess).toBe(false);
  });

  it('should let command-line options win over the file', async () => {
    vol.fromJSON({ '/cfg.json': JSON.stringify({ server: { host: '127.0.0.1', port: 4800 } }) });

    const { manager, logger } = await createCliContext(
      { config: '/cfg.json', host: '10.1.2.3', port: '4900', logLevel: 'silent' },
      {}
    );

    expect(manager.endpoint).toEqual({ host: '10.1.2.3', port: 4900 });
    expect(logger.level).toBe('silent');
  });

  it('should read the config path from WDKEEPER_CONFIG', async () => {
    vol.fromJSON({ '/env.json': JSON.stringify({ server: { port: 4811 } }) });

    const { manager, config } = await createCliContext({}, { WDKEEPER_CONFIG: '/env.json' });

    expect(config.path).toBe('/env.json');
    expect(manager.endpoint.port).toBe(4811);
  });

  it('should fall back to defaults without a config file', async () => {
    const { manager, config } = await createCliContext({ logLevel: 'silent' }, {});

    expect(config.exists).toBe(false);
    expect(manager.url).toBe('http://localhost:4723');
  });

  it('should fail when an explicitly named file is missing', async () => {
    await expect(createCliContext({ config: '/missing.json' }, {})).rejects.toMatchObject({
      code: ErrorCode.E_CONFIG_NOT_FOUND
    });
  });

  it('should reject an unknown log level', async () => {
    await expect(createCliContext({ logLevel: 'chatty' }, {})).rejects.toMatchObject({
      code: ErrorCode.E_CONFIG_INVALID,
      message: 'Unknown log level: chatty'
    });
  });

  it('should reject a port that is not a number', async () => {
    await expect(createCliContext({ port: 'http', logLevel: 'silent' }, {})).rejects.toMatchObject({
      code: ErrorCode.E_CONFIG_INVALID
    });
  });
});
