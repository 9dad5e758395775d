/**
 * Environment variable expansion for configuration files
 *
 * Supports:
 * - ${VAR} - expands to the value of VAR
 * - ${VAR:-default} - expands to VAR if set, otherwise uses default
 */

import { ErrorCode, WdkeeperError } from '../errors/index.js';

export type GetEnv = (key: string) => string | undefined;

const defaultGetEnv: GetEnv = (key) => process.env[key];

const PLACEHOLDER = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

/**
 * Expand environment variables in a string
 * @throws WdkeeperError if a variable is undefined and has no default
 */
export function expandEnvironmentVariables(value: string, getEnv: GetEnv = defaultGetEnv): string {
  return value.replace(PLACEHOLDER, (_match, varName: string, defaultValue?: string) => {
    const envValue = getEnv(varName);
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new WdkeeperError(
      ErrorCode.E_CONFIG_INVALID,
      `Environment variable '${varName}' is not defined and no default value provided`
    );
  });
}

/**
 * Names of required variables referenced by `value` that are not set
 */
function findMissingVariables(value: string, getEnv: GetEnv): string[] {
  const missing: string[] = [];
  for (const match of value.matchAll(PLACEHOLDER)) {
    const [, varName, defaultValue] = match;
    if (varName && defaultValue === undefined && getEnv(varName) === undefined) {
      missing.push(varName);
    }
  }
  return missing;
}

function walk(value: unknown, visit: (text: string) => string): unknown {
  if (typeof value === 'string') {
    return visit(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => walk(item, visit));
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, walk(item, visit)])
    );
  }
  return value;
}

/**
 * Expand every string in a parsed configuration document.
 * All missing variables are reported together before anything is expanded.
 */
export function expandConfig(config: unknown, getEnv: GetEnv = defaultGetEnv): unknown {
  const missing = new Set<string>();
  walk(config, (text) => {
    for (const name of findMissingVariables(text, getEnv)) missing.add(name);
    return text;
  });

  if (missing.size > 0) {
    throw new WdkeeperError(
      ErrorCode.E_CONFIG_INVALID,
      `Missing required environment variables: ${[...missing].join(', ')}`
    );
  }

  return walk(config, (text) => expandEnvironmentVariables(text, getEnv));
}
