import {
  createEndpoint,
  DEFAULT_CONFIG_FILE,
  ErrorCode,
  isLogLevel,
  type LogLevel,
  WdkeeperError
} from '@wdkeeper/core';
import { AutomationServerManager } from '@wdkeeper/lifecycle';
import { loadConfig } from '../config.js';
import { Logger } from '../logger.js';
import type { CliContext, GlobalOptions } from '../types.js';

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new WdkeeperError(ErrorCode.E_CONFIG_INVALID, `Unknown log level: ${value}`);
  }
  return value;
}

/**
 * Load configuration, apply command-line overrides and build the manager
 */
export async function createCliContext(
  globals: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<CliContext> {
  const cliLevel = parseLogLevel(globals.logLevel);
  const explicitPath = globals.config ?? env.WDKEEPER_CONFIG;

  const config = await loadConfig(explicitPath ?? DEFAULT_CONFIG_FILE, new Logger(cliLevel ?? 'info', '', env), {
    required: explicitPath !== undefined,
    env
  });

  const logger = new Logger(cliLevel ?? config.data.logLevel, '', env);
  const server = config.data.server;
  // Validates the command-line host and port
  const endpoint = createEndpoint(globals.host ?? server.host, globals.port ? Number(globals.port) : server.port);

  logger.debug(
    { config: config.path, exists: config.exists, host: endpoint.host, port: endpoint.port },
    'Configuration resolved'
  );

  const manager = AutomationServerManager.fromConfig(
    { ...server, host: endpoint.host, port: endpoint.port },
    { logger: logger.child('lifecycle') }
  );

  return { logger, config, manager };
}
