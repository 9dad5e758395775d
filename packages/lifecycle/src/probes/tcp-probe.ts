import { createConnection } from 'node:net';
import { ErrorCode, ErrorSeverity, type ServerEndpoint, WdkeeperError } from '@wdkeeper/core';
import type { HealthProbe, ProbeOutcome } from './types.js';

/**
 * Raw TCP connect. A completed handshake means something is listening.
 */
export function createTcpProbe(endpoint: ServerEndpoint, timeoutMs: number): HealthProbe {
  const name = `TCP ${endpoint.host}:${endpoint.port}`;

  const run = (): Promise<ProbeOutcome> =>
    new Promise((resolve) => {
      const socket = createConnection({ host: endpoint.host, port: endpoint.port });

      const finish = (outcome: ProbeOutcome) => {
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.on('error', () => socket.destroy());
        socket.destroy();
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        finish({
          kind: 'error',
          probe: name,
          error: new WdkeeperError(
            ErrorCode.E_PROBE_TIMEOUT,
            `TCP connect timed out after ${timeoutMs}ms: ${endpoint.host}:${endpoint.port}`,
            { severity: ErrorSeverity.INFO, context: { ...endpoint }, recoverable: true }
          )
        });
      }, timeoutMs);

      socket.once('connect', () => finish({ kind: 'up', probe: name }));
      socket.once('error', (error) => {
        finish({
          kind: 'error',
          probe: name,
          error: new WdkeeperError(
            ErrorCode.E_PROBE_FAILED,
            `TCP connect failed: ${endpoint.host}:${endpoint.port}`,
            { severity: ErrorSeverity.INFO, context: { ...endpoint }, cause: error, recoverable: true }
          )
        });
      });
    });

  return { name, run };
}
