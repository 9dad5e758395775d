/**
 * @wdkeeper/lifecycle - Start, probe, restart and stop a mobile automation server
 */

export { isAutomationServerRunning, startAutomationServer } from './convenience.js';
export { createOperationLock, type LifecycleOperation, type OperationLock } from './operation-lock.js';
export * from './probes/index.js';
export * from './process/index.js';
export { withAutomationServer, type ScopedServerOptions } from './scoped.js';
export { AutomationServerManager, type AutomationServerManagerOptions } from './server-manager.js';
