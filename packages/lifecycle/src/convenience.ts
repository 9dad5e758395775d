import { ErrorCode, WdkeeperError } from '@wdkeeper/core';
import { AutomationServerManager, type AutomationServerManagerOptions } from './server-manager.js';

/**
 * Ensure a server is running and hand back its manager; throws when it cannot be started
 */
export async function startAutomationServer(
  options: AutomationServerManagerOptions = {},
  timeoutMs?: number
): Promise<AutomationServerManager> {
  const manager = new AutomationServerManager(options);

  if (!(await manager.ensureRunning(timeoutMs))) {
    const { host, port } = manager.endpoint;
    throw new WdkeeperError(ErrorCode.E_SERVER_START_FAILED, `Failed to start automation server on ${host}:${port}`, {
      context: { host, port },
      cause: manager.getLastError()
    });
  }

  return manager;
}

/**
 * One-shot probe
 */
export function isAutomationServerRunning(options: AutomationServerManagerOptions = {}): Promise<boolean> {
  return new AutomationServerManager(options).isRunning();
}
