/**
 * Pull-based view over a WebSocket.
 *
 * The read loop asks for one frame at a time and can abandon the wait through
 * an AbortSignal, so cancelling a read never depends on the socket closing.
 */

import WebSocket from 'ws';
import type { Chunk } from '../protocol/framing.js';
import { ConnectionError, TimeoutError, abortError } from '../utils/errors.js';

export type TransportFrame =
  | { type: 'data'; data: Chunk; endOfMessage: boolean }
  | { type: 'close'; code: number; reason: string };

export interface StreamSocket {
  readonly isOpen: boolean;
  /** Resolve with the next frame; rejects on transport error or abort. */
  receive(signal: AbortSignal): Promise<TransportFrame>;
  /** Graceful close handshake. */
  close(code?: number, reason?: string): Promise<void>;
}

export interface ConnectOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface StreamTransport {
  connect(url: string, options?: ConnectOptions): Promise<StreamSocket>;
}

type Waiter = {
  resolve: (frame: TransportFrame) => void;
  reject: (err: Error) => void;
};

const CLOSE_WAIT_MS = 1000;

export class WsStreamSocket implements StreamSocket {
  private queue: TransportFrame[] = [];
  private waiter?: Waiter;
  private terminal?: TransportFrame | Error;

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (data, _isBinary) => {
      if (Array.isArray(data)) {
        data.forEach((fragment, i) => {
          this.enqueue({ type: 'data', data: fragment, endOfMessage: i === data.length - 1 });
        });
      } else {
        this.enqueue({ type: 'data', data, endOfMessage: true });
      }
    });

    ws.on('close', (code, reason) => {
      this.finish({ type: 'close', code, reason: reason.toString() });
    });

    ws.on('error', (err) => {
      this.finish(new ConnectionError(err.message));
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  receive(signal: AbortSignal): Promise<TransportFrame> {
    if (signal.aborted) {
      return Promise.reject(abortError());
    }

    const next = this.queue.shift();
    if (next) return Promise.resolve(next);

    if (this.terminal) {
      return this.terminal instanceof Error
        ? Promise.reject(this.terminal)
        : Promise.resolve(this.terminal);
    }

    return new Promise<TransportFrame>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = undefined;
        reject(abortError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (frame) => {
          signal.removeEventListener('abort', onAbort);
          resolve(frame);
        },
        reject: (err) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
    });
  }

  close(code = 1000, reason = 'client closing'): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_WAIT_MS);
      this.ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (this.ws.readyState === WebSocket.OPEN) {
        this.ws.close(code, reason);
      } else {
        this.ws.terminate();
      }
    });
  }

  private enqueue(frame: TransportFrame): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve(frame);
      return;
    }
    this.queue.push(frame);
  }

  private finish(outcome: TransportFrame | Error): void {
    // First terminal event wins; ws emits 'close' after 'error'
    if (this.terminal) return;
    this.terminal = outcome;

    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = undefined;
    if (outcome instanceof Error) {
      waiter.reject(outcome);
    } else {
      waiter.resolve(outcome);
    }
  }
}

/** WebSocket transport backed by the `ws` package. */
export class WsTransport implements StreamTransport {
  connect(url: string, options: ConnectOptions = {}): Promise<StreamSocket> {
    const { signal, timeoutMs = 5000 } = options;
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    return new Promise<StreamSocket>((resolve, reject) => {
      let settled = false;
      const ws = new WebSocket(url, { handshakeTimeout: timeoutMs });

      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        ws.removeAllListeners();
        // Keep a listener so a late 'error' from terminate() is not unhandled
        ws.on('error', () => undefined);
        ws.terminate();
        reject(err);
      };

      const onAbort = (): void => fail(abortError());

      const timer = setTimeout(() => {
        fail(new TimeoutError(`connect ${url}`, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        ws.removeAllListeners();
        resolve(new WsStreamSocket(ws));
      });

      ws.once('error', (err) => fail(new ConnectionError(err.message)));
      ws.once('close', (code) => fail(new ConnectionError(`closed during handshake (code ${code})`)));
    });
  }
}
