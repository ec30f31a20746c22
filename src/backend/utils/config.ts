/**
 * Runtime configuration for one finder run, read from the environment once
 * at startup and passed explicitly to the Discogs client.
 */

export const DEFAULT_BASE_URL = 'https://api.discogs.com';
export const DEFAULT_USER_AGENT = 'VinylOnlyFinder/1.0';
export const DEFAULT_MIN_REQUEST_DELAY_MS = 1000;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_TIMEOUT_MS = 10000;

export interface FinderConfig {
  baseUrl: string;
  userAgent: string;
  /** Discogs personal access token; unauthenticated requests when absent */
  token?: string;
  minRequestDelayMs: number;
  maxRetries: number;
  timeoutMs: number;
}

export class ConfigError extends Error {
  constructor(
    public variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  variable: string,
  fallback: number,
  min: number
): number {
  const raw = env[variable]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(
      variable,
      `${variable} must be a number >= ${min}, got "${raw}"`
    );
  }
  return value;
}

export function loadConfig(env: Env = process.env): FinderConfig {
  const token = env.DISCOGS_API_KEY?.trim();
  const maxRetries = readNumber(
    env,
    'DISCOGS_MAX_RETRIES',
    DEFAULT_MAX_RETRIES,
    1
  );
  if (!Number.isInteger(maxRetries)) {
    throw new ConfigError(
      'DISCOGS_MAX_RETRIES',
      `DISCOGS_MAX_RETRIES must be an integer, got "${env.DISCOGS_MAX_RETRIES}"`
    );
  }

  return {
    baseUrl: env.DISCOGS_API_BASE_URL?.trim() || DEFAULT_BASE_URL,
    userAgent: env.DISCOGS_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    token: token || undefined,
    minRequestDelayMs: readNumber(
      env,
      'DISCOGS_MIN_REQUEST_DELAY_MS',
      DEFAULT_MIN_REQUEST_DELAY_MS,
      0
    ),
    maxRetries,
    timeoutMs: readNumber(env, 'DISCOGS_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1),
  };
}
