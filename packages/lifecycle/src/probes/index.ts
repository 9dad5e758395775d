export { buildHealthProbes, foldProbeOutcomes, type HealthProbeOptions, runProbeChain } from './chain.js';
export { createHttpProbe } from './http-probe.js';
export { createTcpProbe } from './tcp-probe.js';
export type { HealthProbe, ProbeOutcome, ProbeVerdict } from './types.js';
