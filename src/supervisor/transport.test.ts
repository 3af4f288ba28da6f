import { once } from 'node:events';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer } from 'ws';
import { ConnectionError } from '../utils/errors.js';
import { WsTransport } from './transport.js';

describe('WsTransport', () => {
  let server: WebSocketServer;
  let url: string;

  beforeEach(async () => {
    server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    await once(server, 'listening');
    const address = server.address();
    if (typeof address === 'string') throw new Error(`unexpected address ${address}`);
    url = `ws://127.0.0.1:${address.port}/ws`;
  });

  afterEach(async () => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('delivers messages and then the close frame', async () => {
    server.on('connection', (socket) => {
      socket.send('{"type":"log","message":"hi"}');
      socket.close(4000, 'bye');
    });

    const socket = await new WsTransport().connect(url);
    const signal = new AbortController().signal;

    const first = await socket.receive(signal);
    expect(first.type).toBe('data');
    if (first.type === 'data') {
      expect(String(first.data)).toBe('{"type":"log","message":"hi"}');
      expect(first.endOfMessage).toBe(true);
    }

    await expect(socket.receive(signal)).resolves.toEqual({ type: 'close', code: 4000, reason: 'bye' });
  });

  it('abandons a pending receive on abort and closes cleanly', async () => {
    const socket = await new WsTransport().connect(url);
    expect(socket.isOpen).toBe(true);

    const controller = new AbortController();
    const pending = socket.receive(controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    await socket.close();
    expect(socket.isOpen).toBe(false);
  });

  it('rejects with a ConnectionError when nothing is listening', async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));

    await expect(new WsTransport().connect(url, { timeoutMs: 2000 })).rejects.toBeInstanceOf(ConnectionError);
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new WsTransport().connect(url, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
  });
});
