import { createEndpoint, ErrorCode } from '@wdkeeper/core';
import { getRandomPort, listenRawTcp } from '@wdkeeper/test-utils';
import { describe, expect, it } from 'vitest';
import { createTcpProbe } from './tcp-probe.js';

describe('createTcpProbe', () => {
  it('should report up when a listener accepts the connection', async () => {
    const port = await getRandomPort();
    const close = await listenRawTcp(port);
    try {
      const outcome = await createTcpProbe(createEndpoint('127.0.0.1', port), 1000).run();
      expect(outcome).toEqual({ kind: 'up', probe: `TCP 127.0.0.1:${port}` });
    } finally {
      await close();
    }
  });

  it('should return an error outcome when the connection is refused', async () => {
    const port = await getRandomPort();
    const outcome = await createTcpProbe(createEndpoint('127.0.0.1', port), 1000).run();

    expect(outcome.kind).toBe('error');
    if (outcome.kind === 'error') {
      expect(outcome.error.code).toBe(ErrorCode.E_PROBE_FAILED);
      expect(outcome.error.context).toEqual({ host: '127.0.0.1', port });
    }
  });
});
