import { ErrorCode, WdkeeperError } from '@wdkeeper/core';
import type { AutomationServerManager } from './server-manager.js';

export type ScopedServerOptions = {
  timeoutMs?: number;
  /** Throw E_SERVER_START_FAILED instead of calling `fn` when the server is not ready (default true) */
  requireReady?: boolean;
};

/**
 * Run `fn` with the automation server ensured running, and always release it afterwards.
 * Only a process this manager launched is stopped on exit.
 */
export async function withAutomationServer<T>(
  manager: AutomationServerManager,
  fn: (ready: boolean) => Promise<T> | T,
  options: ScopedServerOptions = {}
): Promise<T> {
  const { timeoutMs, requireReady = true } = options;

  try {
    const ready = await manager.ensureRunning(timeoutMs);
    if (!ready && requireReady) {
      throw new WdkeeperError(
        ErrorCode.E_SERVER_START_FAILED,
        `Failed to start automation server on ${manager.endpoint.host}:${manager.endpoint.port}`,
        {
          context: { host: manager.endpoint.host, port: manager.endpoint.port },
          cause: manager.getLastError()
        }
      );
    }
    return await fn(ready);
  } finally {
    await manager.stopServer();
  }
}
