import {
  createErrorFromUnknown,
  ErrorCode,
  getHealthCheckUrls,
  type ServerEndpoint
} from '@wdkeeper/core';
import { createHttpProbe } from './http-probe.js';
import { createTcpProbe } from './tcp-probe.js';
import type { HealthProbe, ProbeOutcome, ProbeVerdict } from './types.js';

export type HealthProbeOptions = {
  basePath: string;
  httpProbeMs: number;
  tcpProbeMs: number;
};

/**
 * HTTP status probes in order, then the TCP fallback
 */
export function buildHealthProbes(endpoint: ServerEndpoint, options: HealthProbeOptions): HealthProbe[] {
  return [
    ...getHealthCheckUrls(endpoint, options.basePath).map((url) => createHttpProbe(url, options.httpProbeMs)),
    createTcpProbe(endpoint, options.tcpProbeMs)
  ];
}

/**
 * Fold ordered outcomes into one verdict: running iff any probe is up
 */
export function foldProbeOutcomes(outcomes: readonly ProbeOutcome[]): ProbeVerdict {
  const up = outcomes.find((outcome) => outcome.kind === 'up');
  return up ? { running: true, by: up.probe, outcomes } : { running: false, outcomes };
}

/**
 * Run probes one at a time, stopping at the first that reports up.
 * A probe that throws counts as an error outcome.
 */
export async function runProbeChain(probes: readonly HealthProbe[]): Promise<ProbeVerdict> {
  const outcomes: ProbeOutcome[] = [];

  for (const probe of probes) {
    let outcome: ProbeOutcome;
    try {
      outcome = await probe.run();
    } catch (error) {
      outcome = { kind: 'error', probe: probe.name, error: createErrorFromUnknown(error, ErrorCode.E_PROBE_FAILED) };
    }
    outcomes.push(outcome);
    if (outcome.kind === 'up') break;
  }

  return foldProbeOutcomes(outcomes);
}
