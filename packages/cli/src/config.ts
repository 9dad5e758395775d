/**
 * Configuration Loader
 *
 * Loads JSON/JSONC configuration, expands ${VAR} references and validates with Zod.
 * A missing default file yields defaults; a file named explicitly must exist.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import {
  ErrorCode,
  expandConfig,
  formatConfigError,
  type Logger,
  safeParseConfig,
  type WdkeeperConfig,
  WdkeeperError
} from '@wdkeeper/core';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';

export type LoadedConfig = {
  path: string;
  exists: boolean;
  data: WdkeeperConfig;
};

export type LoadConfigOptions = {
  /** Fail with E_CONFIG_NOT_FOUND instead of falling back to defaults */
  required?: boolean;
  env?: NodeJS.ProcessEnv;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * WDKEEPER_HOST / WDKEEPER_PORT win over the file
 */
export function applyEnvironmentOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  const overrides: Record<string, string> = {};
  if (env.WDKEEPER_HOST) overrides.host = env.WDKEEPER_HOST;
  if (env.WDKEEPER_PORT) overrides.port = env.WDKEEPER_PORT;

  if (Object.keys(overrides).length === 0 || !isRecord(raw)) {
    return raw;
  }

  const server = isRecord(raw.server) ? raw.server : {};
  return { ...raw, server: { ...server, ...overrides } };
}

function parseDocument(content: string, path: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });

  const [first] = errors;
  if (first) {
    throw new WdkeeperError(
      ErrorCode.E_CONFIG_PARSE_ERROR,
      `Invalid JSON in configuration file ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { context: { configPath: path } }
    );
  }
  return parsed;
}

function validate(raw: unknown, path: string): WdkeeperConfig {
  const result = safeParseConfig(raw);
  if (!result.success) {
    throw new WdkeeperError(ErrorCode.E_CONFIG_INVALID, formatConfigError(result.error), {
      context: { configPath: path }
    });
  }
  return result.data;
}

/**
 * Load configuration from file
 * @returns Validated configuration with metadata
 */
export async function loadConfig(
  configPath: string,
  logger: Logger,
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const absolutePath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    if (options.required) {
      throw new WdkeeperError(ErrorCode.E_CONFIG_NOT_FOUND, `Configuration file not found: ${absolutePath}`, {
        context: { configPath: absolutePath }
      });
    }
    logger.debug(`Config file not found: ${absolutePath}, using defaults`);
    return {
      path: absolutePath,
      exists: false,
      data: validate(applyEnvironmentOverrides({}, env), absolutePath)
    };
  }

  try {
    const content = await readFile(absolutePath, 'utf-8');
    const raw = parseDocument(content, absolutePath);
    const expanded = expandConfig(raw, (key) => env[key]);
    const data = validate(applyEnvironmentOverrides(expanded, env), absolutePath);

    logger.debug(`Loaded, expanded, and validated config from ${absolutePath}`);
    return { path: absolutePath, exists: true, data };
  } catch (error) {
    if (error instanceof WdkeeperError) {
      throw error;
    }
    throw new WdkeeperError(
      ErrorCode.E_CONFIG_PARSE_ERROR,
      `Failed to read configuration file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`,
      { context: { configPath: absolutePath }, cause: error }
    );
  }
}
