export { buildLaunchArgs } from './launch-args.js';
export {
  type KillFn,
  type LaunchOptions,
  ManagedProcess,
  nodeProcessDriver,
  type ProcessDriver,
  type SpawnedProcess,
  type SpawnFn
} from './managed-process.js';
