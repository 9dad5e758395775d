import { createServer } from 'node:net';

/**
 * Get a loopback port that is free right now
 */
export async function getRandomPort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();

    server.listen(0, host, () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Failed to get port'));
        return;
      }

      const port = address.port;
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve(port);
        }
      });
    });

    server.on('error', reject);
  });
}

/**
 * Listen on a port with a bare TCP server that never speaks HTTP.
 * Returns the close function.
 */
export async function listenRawTcp(port: number, host = '127.0.0.1'): Promise<() => Promise<void>> {
  const server = createServer((socket) => {
    socket.on('error', () => socket.destroy());
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => resolve());
  });

  return () =>
    new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
}
