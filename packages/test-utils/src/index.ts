export { waitFor, delay } from './wait-for.js';
export { getRandomPort, listenRawTcp } from './port-utils.js';
export { createStubAutomationServer } from './stub-server.js';
export {
  FakeChildProcess,
  FakeProcessTable,
  createSpawnError,
  type FakeSpawnBehavior,
  type FakeSpawnOptions,
  type FakeSpawnRecord
} from './fake-child-process.js';
export type { StubAutomationServer, StubRoutes, StubServerOptions, WaitForOptions } from './types.js';
