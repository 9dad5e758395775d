/**
 * Start command - Ensure the server is up and hold it until interrupted
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { CliDeps, GlobalOptions } from '../types.js';
import { parseTimeout } from '../utils.js';
import { exitCodeForSignal } from '../utils/run-command.js';

interface StartOptions {
  timeout?: number;
}

export function setupStartCommand(program: Command, deps: CliDeps): void {
  program
    .command('start')
    .description('Start the automation server if needed and keep it until SIGINT/SIGTERM')
    .option('-t, --timeout <ms>', 'startup timeout in milliseconds', parseTimeout)
    .action(async (options: StartOptions, command: Command) => {
      const { manager, logger } = await deps.createContext(command.optsWithGlobals<GlobalOptions>());

      // Listen before launching so an interrupt during startup still stops the server
      const shutdown = deps.waitForShutdown();
      const first = await Promise.race([
        manager.ensureRunning(options.timeout).then((ready) => ({ ready })),
        shutdown.then((signal) => ({ signal }))
      ]);

      if ('signal' in first) {
        logger.info({ signal: first.signal }, 'Interrupted during startup');
        process.exitCode = (await manager.stopServer()) ? exitCodeForSignal(first.signal) : 1;
        return;
      }

      if (!first.ready) {
        const reason = manager.getLastError()?.message;
        console.error(chalk.red(`✗ Failed to start automation server at ${manager.url}${reason ? `: ${reason}` : ''}`));
        process.exitCode = 1;
        return;
      }

      const detail = manager.ownsProcess ? `pid ${manager.pid}` : 'already running';
      console.log(`${chalk.green(`✓ Automation server ready at ${manager.url}`)} ${chalk.dim(`(${detail})`)}`);

      const signal = await shutdown;
      logger.info({ signal }, 'Shutting down');

      // Only a server launched above is stopped
      process.exitCode = (await manager.stopServer()) ? 0 : 1;
    });
}
