import type { WdkeeperError } from '@wdkeeper/core';

/**
 * Result of a single health probe
 */
export type ProbeOutcome =
  | { kind: 'up'; probe: string; status?: number }
  | { kind: 'inconclusive'; probe: string; status?: number; reason: string }
  | { kind: 'error'; probe: string; error: WdkeeperError };

export type ProbeVerdict = {
  running: boolean;
  /** Probe that reported the server up */
  by?: string;
  outcomes: readonly ProbeOutcome[];
};

export type HealthProbe = {
  readonly name: string;
  run(): Promise<ProbeOutcome>;
};
