import { AxiosInstance } from 'axios';

import { FinderConfig } from '../utils/config';
import {
  Clock,
  createDiscogsAxios,
  RequestThrottle,
  Sleep,
  sleep,
} from '../utils/discogsAxios';
import { createLogger } from '../utils/logger';

export type QueryParams = Record<string, string | number>;

export type CatalogResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; body: unknown };

/**
 * The read-only surface of the Discogs API the finder depends on.
 */
export interface CatalogClient {
  get<T>(path: string, params?: QueryParams): Promise<CatalogResponse<T>>;
}

export interface DiscogsClientOptions {
  /** Clock used by the request throttle */
  now?: Clock;
  /** Used both for throttle waits and retry backoff */
  sleep?: Sleep;
}

const HTTP_TOO_MANY_REQUESTS = 429;
const BACKOFF_BASE_MS = 2000;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Backoff before retrying a throttled request: 2s, 4s, 8s, 16s, 32s ...
 */
export function backoffDelayMs(attempt: number): number {
  return BACKOFF_BASE_MS * 2 ** attempt;
}

/**
 * Rate-limited Discogs API client.
 *
 * Requests are paced by a {@link RequestThrottle} shared across every call
 * this client makes. HTTP 429 responses are retried with exponential backoff
 * up to `maxRetries` attempts; when the budget runs out the last 429 is
 * returned as an unsuccessful response.
 */
export class DiscogsClient implements CatalogClient {
  private readonly axios: AxiosInstance;
  private readonly maxRetries: number;
  private readonly sleep: Sleep;
  private logger = createLogger('DiscogsClient');

  constructor(config: FinderConfig, options: DiscogsClientOptions = {}) {
    this.sleep = options.sleep ?? sleep;
    this.maxRetries = config.maxRetries;
    const throttle = new RequestThrottle(
      config.minRequestDelayMs,
      options.now,
      this.sleep
    );
    this.axios = createDiscogsAxios(config, throttle);

    if (config.token) {
      this.logger.info('Using authenticated API requests');
    } else {
      this.logger.info(
        'No DISCOGS_API_KEY set, using unauthenticated API requests'
      );
    }
  }

  getAxiosInstance(): AxiosInstance {
    return this.axios;
  }

  async get<T>(
    path: string,
    params?: QueryParams
  ): Promise<CatalogResponse<T>> {
    let status = 0;
    let body: unknown;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const response = await this.axios.get<T>(path, { params });
      status = response.status;

      if (isSuccessStatus(status)) {
        return { ok: true, status, data: response.data };
      }

      body = response.data;
      if (status !== HTTP_TOO_MANY_REQUESTS) {
        return { ok: false, status, body };
      }

      if (attempt + 1 < this.maxRetries) {
        const waitMs = backoffDelayMs(attempt);
        this.logger.warn(
          `Rate limited on ${path}. Waiting ${waitMs / 1000}s before retry ${attempt + 1}/${this.maxRetries}...`
        );
        await this.sleep(waitMs);
      }
    }

    this.logger.warn(
      `Still rate limited on ${path} after ${this.maxRetries} attempts`
    );
    return { ok: false, status, body };
  }
}
