#!/usr/bin/env node

/**
 * wdkeeper CLI - keep a mobile automation server available for test runs
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isWdkeeperError } from '@wdkeeper/core';
import { createProgram } from './program.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')) as {
  version: string;
};

const program = createProgram({ version: packageJson.version });

// Parse arguments and handle errors
program.parseAsync(process.argv).catch((error: unknown) => {
  const message = isWdkeeperError(error) ? error.toString() : error instanceof Error ? error.message : String(error);
  console.error('Error:', message);
  process.exit(1);
});
