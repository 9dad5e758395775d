import { isLoopbackHost, type ServerEndpoint } from '@wdkeeper/core';

/**
 * Command-line arguments for the automation server.
 * A bind address is passed only for non-loopback hosts.
 */
export function buildLaunchArgs(endpoint: ServerEndpoint, extraArgs: readonly string[] = []): string[] {
  const args = ['--port', String(endpoint.port)];
  if (!isLoopbackHost(endpoint.host)) {
    args.push('--address', endpoint.host);
  }
  return [...args, ...extraArgs];
}
