/**
 * Health Prober
 *
 * Answers "is a backend already listening at the API URL?" with a single
 * short GET. Never cached; every call hits the network.
 */

import { DEFAULT_SIDECAR_CONFIG } from '../config/sidecar-config.js';
import { asError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const HEALTH_PATH = '/api/v1/models/current';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HealthProberOptions {
  apiUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

const log = createLogger('health');

export function healthUrl(apiUrl: string): string {
  return `${apiUrl.replace(/\/+$/, '')}${HEALTH_PATH}`;
}

export class HealthProber {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: HealthProberOptions) {
    this.url = healthUrl(options.apiUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SIDECAR_CONFIG.healthTimeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** True when the backend answers with any 2xx within the timeout. */
  async isReachable(): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(this.url, { method: 'GET', signal: controller.signal });
      log.debug('Health probe answered', { url: this.url, status: response.status });
      return response.ok;
    } catch (err) {
      log.debug('Health probe failed', { url: this.url, error: asError(err).message });
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }
}
