import type { AutomationServerManager } from '@wdkeeper/lifecycle';
import type { LoadedConfig } from './config.js';
import type { Logger } from './logger.js';

/**
 * Options every command accepts
 */
export type GlobalOptions = {
  config?: string;
  host?: string;
  port?: string;
  logLevel?: string;
};

export type CliContext = {
  logger: Logger;
  config: LoadedConfig;
  manager: AutomationServerManager;
};

/**
 * Side-effecting collaborators, replaceable in tests
 */
export type CliDeps = {
  createContext: (globals: GlobalOptions) => Promise<CliContext>;
  /** Resolves with the first shutdown signal received */
  waitForShutdown: () => Promise<NodeJS.Signals>;
  /** Runs a command to completion and resolves with its exit code; `shutdown` signals are forwarded */
  runCommand: (
    command: string,
    args: readonly string[],
    env: NodeJS.ProcessEnv,
    shutdown?: Promise<NodeJS.Signals>
  ) => Promise<number>;
};
