/**
 * Utility Functions
 */

import { MAX_TIMEOUT_MS, WdkeeperConfigSchema } from '@wdkeeper/core';
import { InvalidArgumentError } from 'commander';

/**
 * Generate a default wdkeeper.config.json with every setting spelled out
 */
export function generateDefaultConfig(): string {
  const { version, logLevel, server } = WdkeeperConfigSchema.parse({});

  return `${JSON.stringify({ version, logLevel, server }, null, 2)}\n`;
}

/**
 * Commander parser for millisecond options
 */
export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 1 || ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected an integer between 1 and ${MAX_TIMEOUT_MS}.`);
  }
  return ms;
}
