/**
 * Run command - Execute a command against a running automation server
 */

import { withAutomationServer } from '@wdkeeper/lifecycle';
import type { Command } from 'commander';
import type { CliDeps, GlobalOptions } from '../types.js';
import { parseTimeout } from '../utils.js';
import { exitCodeForSignal } from '../utils/run-command.js';

interface RunOptions {
  timeout?: number;
}

export function setupRunCommand(program: Command, deps: CliDeps): void {
  program
    .command('run')
    .description('Ensure the server, run a command with WDKEEPER_SERVER_URL set, then release the server')
    .option('-t, --timeout <ms>', 'startup timeout in milliseconds', parseTimeout)
    .argument('<command...>', 'command to run, e.g. -- npm test')
    .passThroughOptions()
    .action(async (commandLine: string[], options: RunOptions, command: Command) => {
      const [executable, ...args] = commandLine;
      if (!executable) {
        command.error('missing command to run');
      }

      const { manager, logger } = await deps.createContext(command.optsWithGlobals<GlobalOptions>());

      // Listen before launching so an interrupt still releases the server
      const shutdown = deps.waitForShutdown();
      let received: NodeJS.Signals | undefined;
      void shutdown.then((signal) => {
        received = signal;
        logger.info({ signal }, 'Shutdown requested');
      });

      const exitCode = await withAutomationServer(
        manager,
        async () => {
          if (received) {
            logger.warn({ signal: received }, 'Interrupted before the command started');
            return exitCodeForSignal(received);
          }
          logger.info({ command: commandLine.join(' '), url: manager.url }, 'Running command');
          return deps.runCommand(executable, args, { ...process.env, WDKEEPER_SERVER_URL: manager.url }, shutdown);
        },
        { timeoutMs: options.timeout }
      );

      process.exitCode = exitCode;
    });
}
