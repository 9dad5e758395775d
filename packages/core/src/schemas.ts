/**
 * Configuration schemas for wdkeeper
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import {
  DEFAULT_BASE_PATH,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_HOST,
  DEFAULT_HTTP_PROBE_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_SERVER_COMMAND,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_TCP_PROBE_TIMEOUT_MS
} from './constants.js';

export const MIN_TIMEOUT_MS = 1;
export const MAX_TIMEOUT_MS = 600_000; // 10 minutes

const timeoutMs = (fallback: number, description: string) =>
  z
    .number()
    .int()
    .min(MIN_TIMEOUT_MS)
    .max(MAX_TIMEOUT_MS)
    .default(fallback)
    .describe(description);

/**
 * Lifecycle timing
 */
export const TimeoutConfigSchema = z
  .object({
    startMs: timeoutMs(DEFAULT_START_TIMEOUT_MS, 'How long startServer waits for readiness'),
    pollIntervalMs: timeoutMs(DEFAULT_POLL_INTERVAL_MS, 'Pause between readiness probes'),
    gracePeriodMs: timeoutMs(DEFAULT_GRACE_PERIOD_MS, 'Wait after SIGTERM before SIGKILL'),
    httpProbeMs: timeoutMs(DEFAULT_HTTP_PROBE_TIMEOUT_MS, 'Per-request HTTP health check timeout'),
    tcpProbeMs: timeoutMs(DEFAULT_TCP_PROBE_TIMEOUT_MS, 'TCP connect fallback timeout')
  })
  .strict();

/**
 * Automation server location and launch command
 */
export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).default(DEFAULT_HOST).describe('Server host'),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT).describe('Server port'),
    command: z
      .string()
      .min(1)
      .default(DEFAULT_SERVER_COMMAND)
      .describe('Executable started when the server is absent'),
    args: z.array(z.string()).default([]).describe('Extra launch arguments'),
    env: z.record(z.string()).optional().describe('Extra environment for the server process'),
    basePath: z
      .string()
      .default(DEFAULT_BASE_PATH)
      .describe('WebDriver base path for status and session-listing probes'),
    timeouts: TimeoutConfigSchema.default({})
  })
  .strict();

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug', 'trace']);

/**
 * Main wdkeeper configuration schema
 */
export const WdkeeperConfigSchema = z
  .object({
    $schema: z.string().optional(),
    version: z.literal(1).default(1),
    logLevel: LogLevelSchema.default('info'),
    server: ServerConfigSchema.default({})
  })
  .strict();

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type WdkeeperConfig = z.infer<typeof WdkeeperConfigSchema>;

export function parseConfig(data: unknown): WdkeeperConfig {
  return WdkeeperConfigSchema.parse(data);
}

export function safeParseConfig(data: unknown) {
  return WdkeeperConfigSchema.safeParse(data);
}

/**
 * Render validation issues one per line, with their paths
 */
export function formatConfigError(error: z.ZodError): string {
  const lines = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `  - ${path}: ${issue.message}`;
  });
  return `Configuration validation failed:\n${lines.join('\n')}`;
}
