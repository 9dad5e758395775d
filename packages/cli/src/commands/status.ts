/**
 * Status command - Probe the automation server once
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { CliDeps, GlobalOptions } from '../types.js';

interface StatusOptions {
  json?: boolean;
}

export function setupStatusCommand(program: Command, deps: CliDeps): void {
  program
    .command('status')
    .description('Show whether the automation server answers (exit 1 when it does not)')
    .option('--json', 'print machine-readable output')
    .action(async (options: StatusOptions, command: Command) => {
      const { manager } = await deps.createContext(command.optsWithGlobals<GlobalOptions>());
      const info = await manager.getInfo();

      if (options.json) {
        console.log(JSON.stringify(info, null, 2));
      } else if (info.running) {
        console.log(chalk.green(`✓ Automation server running at ${info.url}`));
      } else {
        console.log(chalk.red(`✗ No automation server at ${info.url}`));
      }

      process.exitCode = info.running ? 0 : 1;
    });
}
