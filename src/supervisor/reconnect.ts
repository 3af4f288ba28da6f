import { createLogger } from '../utils/logger.js';

const log = createLogger('reconnect');

export interface BackoffOptions {
  baseMs?: number;
  maxMs?: number;
}

export const DEFAULT_BACKOFF = {
  baseMs: 500,
  maxMs: 5000,
} as const;

/**
 * Delay before reconnect attempt `attempt` (0-based): base * 2^attempt, capped.
 * 500, 1000, 2000, 4000, then 5000 with the defaults.
 */
export function computeReconnectDelay(attempt: number, options: BackoffOptions = {}): number {
  const { baseMs = DEFAULT_BACKOFF.baseMs, maxMs = DEFAULT_BACKOFF.maxMs } = options;
  const n = Number.isFinite(attempt) && attempt > 0 ? Math.floor(attempt) : 0;
  return Math.min(maxMs, baseMs * Math.pow(2, n));
}

/**
 * Holds at most one pending reconnect. The attempt counter lives with the
 * caller's connection state; this class only turns it into a timer.
 */
export class ReconnectScheduler {
  private timer?: ReturnType<typeof setTimeout>;

  constructor(
    private readonly reconnect: (url: string) => Promise<void>,
    private readonly options: BackoffOptions = {}
  ) {}

  get pending(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Schedule a reconnect to `url` using the current attempt count.
   * @returns the delay in ms, or null when a reconnect is already pending
   */
  schedule(url: string, attempt: number): number | null {
    if (this.timer) {
      return null;
    }

    const delay = computeReconnectDelay(attempt, this.options);
    this.timer = setTimeout(() => {
      // Clear first so a failure inside reconnect() may schedule the next one
      this.timer = undefined;
      this.reconnect(url).catch((err: unknown) => {
        log.error('Reconnect attempt threw', { url, error: String(err) });
      });
    }, delay);
    return delay;
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
