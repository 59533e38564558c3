export interface LastFmConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  /** 0 disables client-side rate limiting */
  requestsPerSecond: number;
}

export interface AppConfig {
  port: number;
  host: string;
  frontendUrl?: string;
  dataDir: string;
  durationCacheFile: string;
  dailyCacheFile: string;
  defaultItemsPerPage: number;
  lastfm: LastFmConfig;
}

export const DEFAULT_LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/';

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseNonNegativeInt(value, fallback);
  return parsed === 0 ? fallback : parsed;
}

/**
 * Builds the typed application config from environment variables.
 * Call after dotenv has populated process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.BACKEND_PORT || env.PORT, 3001),
    host: env.HOST || '127.0.0.1',
    frontendUrl: env.FRONTEND_URL || undefined,
    dataDir: env.DATA_DIR || './data',
    durationCacheFile: env.DURATION_CACHE_FILE || 'song-durations.csv',
    dailyCacheFile: env.DAILY_CACHE_FILE || 'daily-stats.json',
    defaultItemsPerPage: parsePositiveInt(env.DEFAULT_ITEMS_PER_PAGE, 10),
    lastfm: {
      apiKey: env.LASTFM_API_KEY || '',
      baseUrl: env.LASTFM_API_URL || DEFAULT_LASTFM_API_URL,
      timeoutMs: parsePositiveInt(env.LASTFM_TIMEOUT_MS, 10000),
      requestsPerSecond: parseNonNegativeInt(env.LASTFM_REQUESTS_PER_SECOND, 5),
    },
  };
}
