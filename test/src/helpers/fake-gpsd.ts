/**
 * Loopback TCP server that plays gpsd for transport and CLI tests.
 */

import * as net from 'node:net';

export interface FakeGpsd {
  port: number;
  received: string[];
  server: net.Server;
}

/**
 * Start a server that writes `greeting` on connect and `onCommand(line)`
 * for every line it receives.
 */
export function startFakeGpsd(greeting: string, onCommand: (line: string, socket: net.Socket) => void = () => {}): Promise<FakeGpsd> {
  const received: string[] = [];
  const server = net.createServer((socket) => {
    socket.on('error', () => {
      // client teardown resets the connection
    });
    let pending = '';
    socket.on('data', (data) => {
      pending += data.toString('utf-8');
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        const line = pending.slice(0, newline);
        pending = pending.slice(newline + 1);
        received.push(line);
        onCommand(line, socket);
        newline = pending.indexOf('\n');
      }
    });
    socket.write(greeting);
  });

  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve({ port, received, server });
    });
  });
}

export function stopFakeGpsd(gpsd: FakeGpsd): Promise<void> {
  return new Promise((resolve) => gpsd.server.close(() => resolve()));
}

export async function waitUntil(check: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error('condition not met');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}
