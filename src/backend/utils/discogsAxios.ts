import axios, { AxiosInstance } from 'axios';

import { FinderConfig } from './config';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = ms =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Minimum-interval gate between the starts of consecutive requests.
 *
 * One throttle is shared by every request a run makes, whatever resource it
 * targets. The marker advances each time a request is let through, retries
 * included.
 */
export class RequestThrottle {
  private lastRequestAt: number | null = null;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: Clock = Date.now,
    private readonly wait: Sleep = sleep
  ) {}

  async acquire(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.wait(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.now();
  }

  getLastRequestAt(): number | null {
    return this.lastRequestAt;
  }
}

/**
 * Create the axios instance for one run against the Discogs API.
 *
 * Every status resolves (no throw on 4xx/5xx) so callers can branch on the
 * status code; only transport failures reject.
 */
export function createDiscogsAxios(
  config: FinderConfig,
  throttle: RequestThrottle
): AxiosInstance {
  const headers: Record<string, string> = {
    'User-Agent': config.userAgent,
  };
  if (config.token) {
    headers.Authorization = `Discogs token=${config.token}`;
  }

  const instance = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers,
    validateStatus: () => true,
  });

  instance.interceptors.request.use(async requestConfig => {
    await throttle.acquire();
    return requestConfig;
  });

  return instance;
}
