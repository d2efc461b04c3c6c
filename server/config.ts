import { REFERENCE_API, SEPTA_API } from '@shared/config';

export interface ServerConfig {
  port: number;
  databasePath: string;
  trainViewUrl: string;
  nextToArriveUrl: string;
  referenceApiUrl: string;
  vehiclePollIntervalMs: number;
  favoritesRefreshIntervalMs: number;
  requestTimeoutMs: number;
  favoritesArrivalCount: number;
  boardArrivalCount: number;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ServerConfig = {
  port: 3001,
  databasePath: './data/railwatch.db',
  trainViewUrl: SEPTA_API.TRAINVIEW_URL,
  nextToArriveUrl: SEPTA_API.NEXT_TO_ARRIVE_URL,
  referenceApiUrl: REFERENCE_API.BASE_URL,
  vehiclePollIntervalMs: 10 * 1000,
  favoritesRefreshIntervalMs: 5 * 1000,
  requestTimeoutMs: 10 * 1000,
  favoritesArrivalCount: 3,
  boardArrivalCount: 10,
};

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`⚠️ [CONFIG] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the server configuration from environment variables (after dotenv
 * has loaded .env), falling back to defaults.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
    databasePath: readString(env, 'DATABASE_PATH', DEFAULT_CONFIG.databasePath),
    trainViewUrl: readString(env, 'TRAINVIEW_URL', DEFAULT_CONFIG.trainViewUrl),
    nextToArriveUrl: readString(env, 'NEXT_TO_ARRIVE_URL', DEFAULT_CONFIG.nextToArriveUrl),
    referenceApiUrl: readString(env, 'REFERENCE_API_URL', DEFAULT_CONFIG.referenceApiUrl),
    vehiclePollIntervalMs: readPositiveInt(env, 'VEHICLE_POLL_INTERVAL_MS', DEFAULT_CONFIG.vehiclePollIntervalMs),
    favoritesRefreshIntervalMs: readPositiveInt(env, 'FAVORITES_REFRESH_INTERVAL_MS', DEFAULT_CONFIG.favoritesRefreshIntervalMs),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
    favoritesArrivalCount: DEFAULT_CONFIG.favoritesArrivalCount,
    boardArrivalCount: readPositiveInt(env, 'BOARD_ARRIVAL_COUNT', DEFAULT_CONFIG.boardArrivalCount),
  };
}
