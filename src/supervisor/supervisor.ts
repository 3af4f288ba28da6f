/**
 * Sidecar Supervisor
 *
 * Entry point that ties the pieces together:
 * 1. ensureRunning() makes sure a backend is up (spawning one if needed)
 * 2. then makes sure the event stream is connected
 * 3. shutdown() closes the stream and stops a backend we started
 *
 * Outbound commands call ensureRunning() first and then issue their own request.
 */

import { resolveSidecarConfig, type SidecarConfig } from '../config/sidecar-config.js';
import type { StreamMessage } from '../protocol/types.js';
import { asError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { StreamSink, type OutputSink } from '../utils/output-sink.js';
import { ConnectionManager, type ConnectionStatus } from './connection.js';
import { HealthProber, type FetchLike } from './health.js';
import { ProcessManager, type ProcessHandle, type SpawnFn } from './process-manager.js';
import type { StreamTransport } from './transport.js';

export interface SidecarSupervisorOptions {
  /** Overrides applied on top of the environment */
  config?: Partial<SidecarConfig>;
  /** Read for configuration and layered over process.env for the backend */
  env?: NodeJS.ProcessEnv;
  sink?: OutputSink;
  /** Call ensureRunning() from start() */
  autoStart?: boolean;
  transport?: StreamTransport;
  spawn?: SpawnFn;
  fetch?: FetchLike;
}

export interface SupervisorStatus {
  apiUrl: string;
  backend?: ProcessHandle;
  backendReachable: boolean;
  stream: ConnectionStatus;
  streamUrl?: string;
  reconnectAttempts: number;
}

const log = createLogger('supervisor');

export class SidecarSupervisor {
  readonly config: SidecarConfig;
  readonly sink: OutputSink;
  readonly prober: HealthProber;
  readonly processes: ProcessManager;
  readonly connection: ConnectionManager;
  private readonly autoStart: boolean;

  constructor(options: SidecarSupervisorOptions = {}) {
    this.config = resolveSidecarConfig(options.env ?? process.env, options.config);
    this.sink = options.sink ?? new StreamSink();
    this.autoStart = options.autoStart ?? false;

    this.prober = new HealthProber({
      apiUrl: this.config.apiUrl,
      timeoutMs: this.config.healthTimeoutMs,
      fetch: options.fetch,
    });
    this.processes = new ProcessManager({
      pythonPath: this.config.pythonPath,
      backendModule: this.config.backendModule,
      workspaceRoot: this.config.workspaceRoot,
      prober: this.prober,
      sink: this.sink,
      stopGraceMs: this.config.stopGraceMs,
      spawn: options.spawn,
      env: options.env && { ...process.env, ...options.env },
    });
    this.connection = new ConnectionManager({
      apiUrl: this.config.apiUrl,
      sink: this.sink,
      transport: options.transport,
      backoff: { baseMs: this.config.reconnectBaseMs, maxMs: this.config.reconnectMaxMs },
    });
  }

  /** Structured listener for every stream message, alongside the sink output. */
  set onStreamMessage(listener: ((message: StreamMessage) => void) | undefined) {
    this.connection.onMessage = listener;
  }

  /** Runs ensureRunning() when constructed with autoStart. */
  async start(): Promise<void> {
    if (this.autoStart) {
      await this.ensureRunning();
    }
  }

  /** Backend up, then stream connected. Never throws. */
  async ensureRunning(): Promise<void> {
    try {
      await this.processes.ensureRunning();
      await this.connection.ensureConnected();
    } catch (err) {
      log.error('ensureRunning failed', { error: asError(err).message });
    }
  }

  async status(): Promise<SupervisorStatus> {
    return {
      apiUrl: this.config.apiUrl,
      backend: this.processes.handle,
      backendReachable: await this.prober.isReachable(),
      stream: this.connection.state,
      streamUrl: this.connection.targetUrl,
      reconnectAttempts: this.connection.attempts,
    };
  }

  /** Close the stream, then stop a backend we started. Never throws. */
  async shutdown(): Promise<void> {
    log.info('Shutting down');
    try {
      await this.connection.close(true);
    } catch (err) {
      log.warn('Error closing event stream', { error: asError(err).message });
    }
    try {
      await this.processes.stop();
    } catch (err) {
      log.warn('Error stopping backend', { error: asError(err).message });
    }
  }
}
