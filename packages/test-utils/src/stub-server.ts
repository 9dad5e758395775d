import { Server } from 'node:http';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import type { StubAutomationServer, StubServerOptions } from './types.js';
import { delay } from './wait-for.js';

/**
 * In-process stand-in for an automation server's HTTP surface.
 * Answers configured paths with configured statuses; everything else is 404.
 * Can be started and stopped repeatedly on the same port.
 */
export function createStubAutomationServer(options: StubServerOptions): StubAutomationServer {
  const host = options.host ?? '127.0.0.1';
  const routes = new Map(Object.entries(options.routes ?? {}));
  const requests: string[] = [];
  let server: Server | undefined;

  const app = new Hono();

  app.all('*', async (c) => {
    requests.push(c.req.path);

    if (options.responseDelayMs) {
      await delay(options.responseDelayMs);
    }

    const status = routes.get(c.req.path) ?? 404;
    const body =
      status >= 200 && status < 300
        ? { value: { ready: true, message: 'stub automation server ready' } }
        : { value: { error: 'unknown command', message: `No route for ${c.req.path}` } };

    return new Response(status === 204 ? null : JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json; charset=utf-8' }
    });
  });

  const listen = (): Promise<Server> =>
    new Promise((resolve, reject) => {
      const created = serve({ fetch: app.fetch, port: options.port, hostname: host }, () => {
        if (created instanceof Server) resolve(created);
      });
      if (!(created instanceof Server)) {
        reject(new Error('Stub automation server requires an HTTP/1 server'));
        return;
      }
      created.once('error', reject);
    });

  return {
    port: options.port,
    url: `http://${host}:${options.port}`,
    requests,
    get listening() {
      return server !== undefined;
    },
    setRoute(path: string, status: number) {
      routes.set(path, status);
    },
    async start() {
      if (server) return;
      server = await listen();
    },
    async stop() {
      const current = server;
      server = undefined;
      if (!current) return;
      await new Promise<void>((resolve) => {
        current.close(() => resolve());
        current.closeAllConnections();
      });
    }
  };
}
