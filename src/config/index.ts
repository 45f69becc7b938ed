import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig, ServerConfig } from '../types/config.types';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const SERVER_ENVS: ReadonlyArray<ServerConfig['env']> = ['development', 'production', 'test'];

const resolveServerEnv = (value: string | undefined): ServerConfig['env'] => (
  SERVER_ENVS.find((env) => env === value) ?? 'development'
);

const serverEnv = resolveServerEnv(process.env.NODE_ENV);
const isProduction = serverEnv === 'production';

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

export const parseListEnv = (value: string | undefined): string[] => (value || '')
  .split(',')
  .map((item) => item.trim())
  .filter(Boolean);

export const DEFAULT_OPENSKY_TOKEN_URL = 'https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token';

const publisherEnabled = resolveBooleanFlag(
  process.env.ENABLE_PUBLISHER,
  process.env.DISABLE_PUBLISHER,
  isProduction,
);

/**
 * Centralized configuration management
 * OpenSky credentials are resolved separately (see services/openSkyCredentials)
 * so they can also be passed explicitly.
 */
const config: AppConfig = {
  server: {
    port: parseNumber(process.env.PORT, 3005),
    env: serverEnv,
    host: process.env.HOST || '0.0.0.0',
  },
  external: {
    opensky: {
      baseUrl: process.env.OPENSKY_BASE_URL || 'https://opensky-network.org/api',
      tokenUrl: DEFAULT_OPENSKY_TOKEN_URL,
      timeoutMs: Math.max(1000, parseNumber(process.env.OPENSKY_TIMEOUT_MS, 30000)),
    },
  },
  traffic: {
    timeSpanInDays: Math.max(0, parseNumber(process.env.TRAFFIC_TIME_SPAN_IN_DAYS, 1)),
    statesTtlSeconds: Math.max(1, parseNumber(process.env.STATES_CACHE_TTL_SECONDS, 30)),
    connectionsTtlSeconds: Math.max(1, parseNumber(process.env.CONNECTIONS_CACHE_TTL_SECONDS, 600)),
    cacheMaxEntries: Math.max(1, parseNumber(process.env.CACHE_MAX_ENTRIES, 1024)),
  },
  publisher: {
    enabled: publisherEnabled,
    redisUrl: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
    channelPrefix: process.env.PUBLISHER_CHANNEL_PREFIX || 'adsb',
    airports: parseListEnv(process.env.PUBLISHER_AIRPORTS).map((airport) => airport.toUpperCase()),
    intervalSeconds: Math.max(5, parseNumber(process.env.PUBLISHER_INTERVAL_SECONDS, 30)),
  },
};

export default config;
