/**
 * Process Lifecycle Manager
 *
 * Starts the backend process at most once, forwards its output line by line,
 * and tears it down on stop(). A backend that is already answering the health
 * probe (started by someone else) is left alone and never tracked.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import readline from 'node:readline';
import { DEFAULT_SIDECAR_CONFIG } from '../config/sidecar-config.js';
import { SpawnError, asError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import type { OutputSink } from '../utils/output-sink.js';

/** The slice of ChildProcess the manager relies on. */
export interface BackendProcess {
  readonly pid?: number;
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => BackendProcess;

export interface ProcessHandle {
  readonly pid?: number;
  readonly exited: boolean;
  readonly startedByUs: boolean;
}

export interface Reachability {
  isReachable(): Promise<boolean>;
}

export interface ProcessManagerOptions {
  pythonPath: string;
  backendModule: string;
  /** Working directory for the backend; process.cwd() when absent */
  workspaceRoot?: string;
  prober: Reachability;
  sink: OutputSink;
  stopGraceMs?: number;
  spawn?: SpawnFn;
  env?: NodeJS.ProcessEnv;
}

interface TrackedProcess {
  child: BackendProcess;
  pid?: number;
  exited: boolean;
  exit: Promise<void>;
}

const log = createLogger('process');

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/** Resolves true if `promise` settles within `ms`, false otherwise. */
function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  return Promise.race([promise.then(() => true), timeout]).finally(() => clearTimeout(timer));
}

export class ProcessManager {
  private readonly options: ProcessManagerOptions;
  private readonly spawnFn: SpawnFn;
  private readonly stopGraceMs: number;
  private readonly mutex = new Mutex();
  private current?: TrackedProcess;

  constructor(options: ProcessManagerOptions) {
    this.options = options;
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_SIDECAR_CONFIG.stopGraceMs;
  }

  get handle(): ProcessHandle | undefined {
    const current = this.current;
    if (!current) return undefined;
    return { pid: current.pid, exited: current.exited, startedByUs: true };
  }

  get isRunning(): boolean {
    return this.current !== undefined && !this.current.exited;
  }

  /**
   * Make sure a backend is available: keep ours if alive, accept an external
   * one that answers the probe, otherwise spawn. Never throws.
   */
  ensureRunning(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.current && !this.current.exited) return;
      this.current = undefined;

      if (await this.options.prober.isReachable()) {
        log.debug('Backend already reachable, not spawning');
        return;
      }

      try {
        this.current = await this.startBackend();
      } catch (err) {
        const message = asError(err).message;
        log.error('Backend spawn failed', { error: message });
        this.options.sink.appendLine(`Failed to start backend: ${message}`);
      }
    });
  }

  /**
   * Terminate the backend if we started it: SIGTERM, then SIGKILL after the
   * grace period. Idempotent; never throws.
   */
  stop(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const tracked = this.current;
      this.current = undefined;
      if (!tracked || tracked.exited) return;

      try {
        log.info('Stopping backend', { pid: tracked.pid });
        tracked.child.kill('SIGTERM');
        if (await settlesWithin(tracked.exit, this.stopGraceMs)) return;

        log.warn('Backend ignored SIGTERM, killing', { pid: tracked.pid, graceMs: this.stopGraceMs });
        tracked.child.kill('SIGKILL');
        await settlesWithin(tracked.exit, this.stopGraceMs);
      } catch (err) {
        log.warn('Error while stopping backend', { pid: tracked.pid, error: asError(err).message });
      }
    });
  }

  private async startBackend(): Promise<TrackedProcess> {
    const { pythonPath, backendModule } = this.options;
    const args = ['-m', backendModule];
    const cwd = this.options.workspaceRoot ?? process.cwd();
    const commandLine = `${pythonPath} ${args.join(' ')}`;

    let child: BackendProcess;
    try {
      child = this.spawnFn(pythonPath, args, {
        cwd,
        env: this.options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw new SpawnError(commandLine, asError(err).message);
    }

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err) => reject(new SpawnError(commandLine, err.message)));
    });

    let markExited: () => void = () => undefined;
    const tracked: TrackedProcess = {
      child,
      pid: child.pid,
      exited: false,
      exit: new Promise<void>((resolve) => {
        markExited = resolve;
      }),
    };

    child.once('exit', (code, signal) => {
      tracked.exited = true;
      log.info('Backend exited', { pid: tracked.pid, code, signal });
      this.options.sink.appendLine(
        code !== null ? `Backend exited with code ${code}` : `Backend exited (${signal ?? 'unknown'})`
      );
      markExited();
    });
    child.on('error', (err) => {
      log.warn('Backend process error', { pid: tracked.pid, error: err.message });
    });

    this.forwardLines(child.stdout, '[backend] ');
    this.forwardLines(child.stderr, '[backend:err] ');

    log.info('Backend started', { pid: tracked.pid, command: commandLine, cwd });
    this.options.sink.appendLine(`Backend started (pid ${tracked.pid ?? 'unknown'})`);
    return tracked;
  }

  private forwardLines(stream: NodeJS.ReadableStream | null, prefix: string): void {
    if (!stream) return;

    const pump = async (): Promise<void> => {
      const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
      for await (const line of lines) {
        if (line.trim()) {
          this.options.sink.appendLine(`${prefix}${line}`);
        }
      }
    };

    pump().catch((err: unknown) => {
      log.warn('Output forwarding stopped', { prefix: prefix.trim(), error: asError(err).message });
    });
  }
}
