/**
 * Automation server endpoint and the values derived from it
 */

import { DEFAULT_BASE_PATH, LOOPBACK_HOSTS } from '../constants.js';
import { ErrorCode, WdkeeperError } from '../errors/index.js';

/**
 * Network location of the automation server.
 * Frozen on creation; a manager keeps one for its whole life.
 */
export type ServerEndpoint = Readonly<{
  host: string;
  port: number;
}>;

/**
 * Snapshot returned by a manager's getInfo()
 */
export type ServerInfo = {
  host: string;
  port: number;
  url: string;
  running: boolean;
  ownsProcess: boolean;
  pid?: number;
};

/**
 * Reconstructed lifecycle state.
 * `running-external` means something answers that this manager did not launch.
 */
export type LifecycleState =
  | 'unknown'
  | 'probing'
  | 'running-external'
  | 'running-managed'
  | 'stopped'
  | 'failed';

export function createEndpoint(host: string, port: number): ServerEndpoint {
  const trimmed = host.trim();
  if (!trimmed) {
    throw new WdkeeperError(ErrorCode.E_CONFIG_INVALID, 'Server host must not be empty');
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new WdkeeperError(
      ErrorCode.E_CONFIG_INVALID,
      `Server port must be an integer between 1 and 65535, got ${port}`,
      { context: { host: trimmed, port } }
    );
  }
  return Object.freeze({ host: trimmed, port });
}

export function isLoopbackHost(host: string): boolean {
  return LOOPBACK_HOSTS.includes(host.toLowerCase());
}

/**
 * Base URL of the server, with IPv6 literals bracketed
 */
export function getBaseUrl(endpoint: ServerEndpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `http://${host}:${endpoint.port}`;
}

/**
 * Normalize a WebDriver base path: leading slash, no trailing slash, '' for root
 */
export function normalizeBasePath(basePath: string): string {
  const trimmed = basePath.trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Ordered health-check URLs: protocol status, generic status, session listing.
 * Duplicates (a root base path) are dropped.
 */
export function getHealthCheckUrls(
  endpoint: ServerEndpoint,
  basePath: string = DEFAULT_BASE_PATH
): string[] {
  const base = getBaseUrl(endpoint);
  const prefix = normalizeBasePath(basePath);
  const urls = [`${base}${prefix}/status`, `${base}/status`, `${base}${prefix}/sessions`];
  return [...new Set(urls)];
}
