/**
 * Global constants for wdkeeper
 * Keep values environment-agnostic and dependency-free.
 */

/**
 * wdkeeper version string.
 * NOTE: This should be updated by release tooling.
 */
export const WDKEEPER_VERSION = '0.1.0' as const;

/** Default automation server location (Appium's defaults) */
export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 4723;

/** Executable launched when no server answers */
export const DEFAULT_SERVER_COMMAND = 'appium';

/** WebDriver base path used by the protocol status and session-listing paths */
export const DEFAULT_BASE_PATH = '/wd/hub';

export const DEFAULT_START_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_GRACE_PERIOD_MS = 10_000;
export const DEFAULT_HTTP_PROBE_TIMEOUT_MS = 3_000;
export const DEFAULT_TCP_PROBE_TIMEOUT_MS = 2_000;

/** Upper bound for captured stdout/stderr of a managed process, per stream */
export const DEFAULT_OUTPUT_LIMIT_BYTES = 64 * 1024;

/** Hosts that need no explicit bind address when launching the server */
export const LOOPBACK_HOSTS: readonly string[] = ['localhost', '127.0.0.1', '::1'];

export const DEFAULT_CONFIG_FILE = './wdkeeper.config.json';
