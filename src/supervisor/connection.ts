/**
 * Connection Manager
 *
 * Owns the single logical event-stream connection to the backend:
 * - de-duplicates concurrent connect attempts
 * - forces a full reconnect when the target URL changes
 * - runs one background read loop per open socket
 * - hands unexpected disconnects to the reconnect scheduler
 *
 * Every state transition happens under `mutex`. Nothing here throws to callers.
 */

import { MessageFramer } from '../protocol/framing.js';
import { StreamDispatcher } from '../protocol/dispatcher.js';
import { buildStreamUrl, sameStreamUrl } from '../protocol/stream-url.js';
import type { StreamMessage } from '../protocol/types.js';
import { asError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import type { OutputSink } from '../utils/output-sink.js';
import { ReconnectScheduler, type BackoffOptions } from './reconnect.js';
import { WsTransport, type StreamSocket, type StreamTransport } from './transport.js';

export type ConnectionStatus = 'IDLE' | 'CONNECTING' | 'OPEN' | 'CLOSING';

export interface ConnectionManagerOptions {
  /** Backend HTTP base URL; the stream URL is derived from it */
  apiUrl: string;
  sink: OutputSink;
  transport?: StreamTransport;
  backoff?: BackoffOptions;
  connectTimeoutMs?: number;
}

interface ConnectAttempt {
  generation: number;
  abort: AbortController;
  previous?: StreamSocket;
}

const log = createLogger('connection');

export class ConnectionManager {
  private readonly apiUrl: string;
  private readonly sink: OutputSink;
  private readonly transport: StreamTransport;
  private readonly connectTimeoutMs: number;
  private readonly dispatcher: StreamDispatcher;
  private readonly scheduler: ReconnectScheduler;
  private readonly mutex = new Mutex();

  private _state: ConnectionStatus = 'IDLE';
  private url?: string;
  private socket?: StreamSocket;
  private connecting = false;
  private manualClose = false;
  private reconnectAttempts = 0;
  /** Bumped by close(); a connect that finishes under an older generation is discarded */
  private generation = 0;
  private connectAbort?: AbortController;
  private readAbort?: AbortController;
  private readLoop?: Promise<void>;
  private invalidUrlReported = false;

  constructor(options: ConnectionManagerOptions) {
    this.apiUrl = options.apiUrl;
    this.sink = options.sink;
    this.transport = options.transport ?? new WsTransport();
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.dispatcher = new StreamDispatcher(options.sink);
    this.scheduler = new ReconnectScheduler((url) => this.ensureConnected(url), options.backoff);
  }

  get state(): ConnectionStatus {
    return this._state;
  }

  get targetUrl(): string | undefined {
    return this.url;
  }

  get attempts(): number {
    return this.reconnectAttempts;
  }

  get reconnectPending(): boolean {
    return this.scheduler.pending;
  }

  /** Structured listener for every dispatched stream message. */
  set onMessage(listener: ((message: StreamMessage) => void) | undefined) {
    this.dispatcher.onMessage = listener;
  }

  /**
   * Make sure a stream connection to `targetUrl` (default: derived from the
   * API URL) is open or opening. Returns once the attempt has settled.
   */
  async ensureConnected(targetUrl?: string): Promise<void> {
    const url = targetUrl ?? buildStreamUrl(this.apiUrl);
    if (!url) {
      if (!this.invalidUrlReported) {
        this.invalidUrlReported = true;
        log.warn('Cannot derive stream URL', { apiUrl: this.apiUrl });
        this.sink.appendLine(`API Error: Invalid apiUrl '${this.apiUrl}'`);
      }
      return;
    }

    const attempt = await this.mutex.runExclusive((): ConnectAttempt | null => {
      if (this.connecting) return null;
      if ((this._state === 'OPEN' || this._state === 'CONNECTING') && sameStreamUrl(this.url, url)) {
        return null;
      }

      let previous: StreamSocket | undefined;
      if (this.socket && !sameStreamUrl(this.url, url)) {
        log.info('Stream target changed, reconnecting', { from: this.url, to: url });
        previous = this.detachSocket();
      }

      this.connecting = true;
      this.manualClose = false;
      this._state = 'CONNECTING';
      this.url = url;
      const abort = new AbortController();
      this.connectAbort = abort;
      return { generation: this.generation, abort, previous };
    });

    if (!attempt) return;
    const { generation, abort, previous } = attempt;

    if (previous) {
      await this.closeQuietly(previous);
    }

    let socket: StreamSocket;
    try {
      socket = await this.transport.connect(url, {
        signal: abort.signal,
        timeoutMs: this.connectTimeoutMs,
      });
    } catch (err) {
      await this.mutex.runExclusive(() => {
        if (generation !== this.generation) return;
        this.connecting = false;
        this.connectAbort = undefined;
        this._state = 'IDLE';
        this.sink.appendLine(`Event stream error: ${asError(err).message}`);
        log.warn('Stream connect failed', { url, error: asError(err).message });
        if (!this.manualClose) {
          this.scheduleReconnectLocked(url);
        }
      });
      return;
    }

    const stale = await this.mutex.runExclusive(() => {
      if (generation !== this.generation || this.manualClose) {
        return true;
      }

      this.connecting = false;
      this.connectAbort = undefined;
      this.socket = socket;
      this._state = 'OPEN';
      this.reconnectAttempts = 0;
      this.scheduler.cancel();

      const readAbort = new AbortController();
      this.readAbort = readAbort;
      this.readLoop = this.runReadLoop(socket, url, readAbort.signal);

      this.sink.appendLine('Event stream connected');
      log.info('Stream connected', { url });
      return false;
    });

    if (stale) {
      await this.closeQuietly(socket);
    }
  }

  /**
   * Tear down the current connection. With `manual` (the default) automatic
   * reconnection is suppressed until the next ensureConnected(). Idempotent.
   */
  async close(manual = true): Promise<void> {
    const { socket, loop } = await this.mutex.runExclusive(() => {
      this.manualClose = manual;
      this.generation++;
      this.connecting = false;
      this.connectAbort?.abort();
      this.connectAbort = undefined;
      if (manual) {
        this.scheduler.cancel();
      }

      const loop = this.readLoop;
      const socket = this.detachSocket();
      this._state = socket ? 'CLOSING' : 'IDLE';
      if (manual) {
        this.url = undefined;
      }
      return { socket, loop };
    });

    if (socket) {
      await this.closeQuietly(socket);
    }
    await loop;

    await this.mutex.runExclusive(() => {
      if (this._state === 'CLOSING' && !this.socket) {
        this._state = 'IDLE';
      }
    });
  }

  /** Resolves when the current read loop (if any) has exited. */
  whenIdle(): Promise<void> {
    return this.readLoop ?? Promise.resolve();
  }

  private async runReadLoop(socket: StreamSocket, url: string, signal: AbortSignal): Promise<void> {
    const framer = new MessageFramer();
    let detail = 'stream ended';

    try {
      for (;;) {
        const frame = await socket.receive(signal);
        if (frame.type === 'close') {
          detail = frame.reason ? `code ${frame.code}, ${frame.reason}` : `code ${frame.code}`;
          break;
        }

        const text = framer.push(frame.data, frame.endOfMessage);
        if (text) {
          this.dispatcher.dispatch(text);
        }
      }
    } catch (err) {
      if (signal.aborted) return;
      detail = asError(err).message;
    }

    if (signal.aborted) return;
    await this.handleDisconnect(socket, url, detail);
  }

  private handleDisconnect(socket: StreamSocket, url: string, detail: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      // A newer socket replaced this one; its owner handles reconnects
      if (this.socket !== socket) return;

      this.socket = undefined;
      this.readAbort = undefined;
      this._state = 'IDLE';
      this.sink.appendLine(`Event stream disconnected (${detail})`);
      log.info('Stream disconnected', { url, detail });

      if (!this.manualClose) {
        this.scheduleReconnectLocked(url);
      }
    });
  }

  /** Caller must hold `mutex`. */
  private scheduleReconnectLocked(url: string): void {
    const delay = this.scheduler.schedule(url, this.reconnectAttempts);
    if (delay === null) return;

    this.reconnectAttempts++;
    log.debug('Reconnect scheduled', { url, delay, attempt: this.reconnectAttempts });
  }

  /** Caller must hold `mutex`. Stops the read loop and hands back the socket. */
  private detachSocket(): StreamSocket | undefined {
    this.readAbort?.abort();
    this.readAbort = undefined;
    const socket = this.socket;
    this.socket = undefined;
    return socket;
  }

  private async closeQuietly(socket: StreamSocket): Promise<void> {
    try {
      await socket.close(1000, 'client closing');
    } catch (err) {
      log.debug('Ignoring error during stream close', { error: asError(err).message });
    }
  }
}
