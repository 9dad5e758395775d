/**
 * Init command - Write a default configuration file
 */

import { existsSync, writeFileSync } from 'node:fs';
import { DEFAULT_CONFIG_FILE } from '@wdkeeper/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { GlobalOptions } from '../types.js';
import { generateDefaultConfig } from '../utils.js';

interface InitOptions {
  force?: boolean;
}

export function setupInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a default wdkeeper.config.json file')
    .option('-f, --force', 'overwrite existing configuration file')
    .action((options: InitOptions, command: Command) => {
      const configPath = command.optsWithGlobals<GlobalOptions>().config ?? DEFAULT_CONFIG_FILE;

      if (existsSync(configPath) && !options.force) {
        console.error(chalk.red(`✗ Configuration file already exists: ${configPath}`));
        console.error('  Use --force to overwrite');
        process.exitCode = 1;
        return;
      }

      writeFileSync(configPath, generateDefaultConfig());

      console.log(chalk.green(`✓ Created configuration file: ${configPath}`));
      console.log('');
      console.log('Next steps:');
      console.log(`1. Edit ${configPath} to point at your automation server`);
      console.log('2. Run your suite against it:');
      console.log(`   wdkeeper --config ${configPath} run -- npm test`);
    });
}
