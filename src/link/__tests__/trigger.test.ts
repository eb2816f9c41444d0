import { describe, it, expect } from 'vitest';
import dgram from 'dgram';
import net from 'net';
import { sendTrigger } from '../trigger.js';

function listenUdp(): Promise<{ socket: dgram.Socket; port: number }> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket('udp4');
    socket.bind(0, '127.0.0.1', () => {
      resolve({ socket, port: socket.address().port });
    });
  });
}

function listenTcp(onPayload: (payload: string) => void): Promise<{ server: net.Server; port: number }> {
  return new Promise((resolve) => {
    const server = net.createServer((socket) => {
      let payload = '';
      socket.on('data', (chunk) => {
        payload += chunk.toString();
      });
      socket.on('end', () => onPayload(payload));
    });
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
      resolve({ server, port: address.port });
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

describe('sendTrigger', () => {
  it('delivers the payload as a datagram', async () => {
    const { socket, port } = await listenUdp();
    const received = new Promise<string>((resolve) => {
      socket.once('message', (msg) => resolve(msg.toString()));
    });

    const result = await sendTrigger({ host: '127.0.0.1', port, protocol: 'udp', payload: 's' });

    expect(result).toEqual({ delivered: true, attempts: 1 });
    expect(await received).toBe('s');
    socket.close();
  });

  it('delivers the payload over TCP', async () => {
    let resolvePayload: (payload: string) => void = () => {};
    const received = new Promise<string>((resolve) => {
      resolvePayload = resolve;
    });
    const { server, port } = await listenTcp((payload) => resolvePayload(payload));

    const result = await sendTrigger({ host: '127.0.0.1', port, protocol: 'tcp', payload: 'go' });

    expect(result).toEqual({ delivered: true, attempts: 1 });
    expect(await received).toBe('go');
    await closeServer(server);
  });

  it('reports failure after the configured attempts instead of throwing', async () => {
    const { server, port } = await listenTcp(() => {});
    await closeServer(server);

    const result = await sendTrigger(
      { host: '127.0.0.1', port, protocol: 'tcp', payload: 's' },
      { attempts: 2, backoffMs: 1 },
    );

    expect(result.delivered).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.error).toContain('ECONNREFUSED');
  });
});
