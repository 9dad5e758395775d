import { ErrorCode, ErrorSeverity, WdkeeperError } from '@wdkeeper/core';
import type { HealthProbe, ProbeOutcome } from './types.js';

/**
 * GET a health URL. 2xx is up; any other status is inconclusive;
 * transport failures and timeouts are error outcomes.
 */
export function createHttpProbe(url: string, timeoutMs: number): HealthProbe {
  const name = `GET ${url}`;

  const run = async (): Promise<ProbeOutcome> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { method: 'GET', signal: controller.signal });
      await response.body?.cancel();

      if (response.ok) {
        return { kind: 'up', probe: name, status: response.status };
      }
      return {
        kind: 'inconclusive',
        probe: name,
        status: response.status,
        reason: response.status === 404 ? 'not found' : `HTTP ${response.status}`
      };
    } catch (error) {
      const timedOut = controller.signal.aborted;
      return {
        kind: 'error',
        probe: name,
        error: new WdkeeperError(
          timedOut ? ErrorCode.E_PROBE_TIMEOUT : ErrorCode.E_PROBE_FAILED,
          timedOut ? `Probe timed out after ${timeoutMs}ms: ${url}` : `Probe failed: ${url}`,
          { severity: ErrorSeverity.INFO, context: { url }, cause: error, recoverable: true }
        )
      };
    } finally {
      clearTimeout(timeout);
    }
  };

  return { name, run };
}
