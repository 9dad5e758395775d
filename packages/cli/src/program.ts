/**
 * wdkeeper command-line program
 */

import { WDKEEPER_VERSION } from '@wdkeeper/core';
import { Command } from 'commander';
import { setupInitCommand } from './commands/init.js';
import { setupRunCommand } from './commands/run.js';
import { setupStartCommand } from './commands/start.js';
import { setupStatusCommand } from './commands/status.js';
import type { CliDeps } from './types.js';
import { createCliContext } from './utils/manager-factory.js';
import { runCommand, waitForShutdown } from './utils/run-command.js';

export type ProgramOptions = {
  version?: string;
  deps?: Partial<CliDeps>;
};

export function createProgram(options: ProgramOptions = {}): Command {
  const deps: CliDeps = {
    createContext: (globals) => createCliContext(globals),
    waitForShutdown,
    runCommand,
    ...options.deps
  };

  const program = new Command();

  program
    .name('wdkeeper')
    .description('Keep a mobile automation server available for test runs')
    .version(options.version ?? WDKEEPER_VERSION)
    .option('-c, --config <path>', 'path to configuration file')
    .option('--host <host>', 'automation server host')
    .option('--port <port>', 'automation server port')
    .option('--log-level <level>', 'log level (silent, error, warn, info, debug, trace)')
    .enablePositionalOptions();

  setupStatusCommand(program, deps);
  setupStartCommand(program, deps);
  setupRunCommand(program, deps);
  setupInitCommand(program);

  return program;
}

export { applyEnvironmentOverrides, type LoadedConfig, loadConfig } from './config.js';
export { Logger } from './logger.js';
export type { CliContext, CliDeps, GlobalOptions } from './types.js';
export { createCliContext } from './utils/manager-factory.js';
