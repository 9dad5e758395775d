export {
  createEndpoint,
  getBaseUrl,
  getHealthCheckUrls,
  isLoopbackHost,
  type LifecycleState,
  normalizeBasePath,
  type ServerEndpoint,
  type ServerInfo
} from './endpoint.js';
