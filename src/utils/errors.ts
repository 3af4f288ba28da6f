/**
 * Error types for tether.
 *
 * Only BackendRequestError ever leaves the public surface; the supervisor
 * entry points catch and log everything else.
 */

export class TetherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TetherError';
  }
}

export class SpawnError extends TetherError {
  constructor(command: string, reason: string) {
    super(`Failed to spawn backend "${command}": ${reason}`);
    this.name = 'SpawnError';
  }
}

export class ConnectionError extends TetherError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class TimeoutError extends TetherError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class BackendRequestError extends TetherError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'BackendRequestError';
    this.status = status;
  }
}

export function asError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function abortError(message = 'Operation aborted'): Error {
  const err = new Error(message);
  err.name = 'AbortError';
  return err;
}
