import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type {
  AppConfig, FallbackStrategy, FeedProviderName,
} from '../types/config.types';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const parseServerEnv = (value: string | undefined): AppConfig['server']['env'] => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatValue = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseProvider = (value: string | undefined): FeedProviderName => (
  value?.trim().toLowerCase() === 'opensky' ? 'opensky' : 'adsb'
);

const parseFallback = (value: string | undefined): FallbackStrategy => (
  value?.trim().toLowerCase() === 'snapshot' ? 'snapshot' : 'simulated'
);

const parseListEnv = (value: string | undefined): string[] => (value || '')
  .split(',')
  .map((item) => item.trim())
  .filter(Boolean);

const defaultSnapshotPath = path.resolve(__dirname, '../../data/fallbackSnapshot.json');
const fallback = parseFallback(process.env.ACQUISITION_FALLBACK);
// The bundled snapshot is only used when the snapshot strategy is selected
const snapshotPath = process.env.SNAPSHOT_PATH
  || (fallback === 'snapshot' ? defaultSnapshotPath : null);

const defaultAllowedOrigins = [
  `http://localhost:${process.env.PORT || 3005}`,
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];
const envAllowedOrigins = parseListEnv(process.env.CORS_ALLOWED_ORIGINS);

/**
 * Centralized configuration management
 * All environment variables and config should live here
 */
const config: AppConfig = {
  server: {
    port: parseNumber(process.env.PORT, 3005),
    env: parseServerEnv(process.env.NODE_ENV),
    host: process.env.HOST || '0.0.0.0',
  },
  external: {
    opensky: {
      baseUrl: process.env.OPENSKY_BASE_URL || 'https://opensky-network.org/api',
      user: process.env.OPENSKY_USER,
      pass: process.env.OPENSKY_PASS,
    },
    adsb: {
      baseUrl: process.env.ADSB_BASE_URL || 'https://api.adsb.lol/v2',
      maxRadiusNm: 250,
    },
    weather: {
      baseUrl: process.env.WEATHER_BASE_URL || 'https://api.open-meteo.com/v1',
      timeoutMs: Math.max(500, parseNumber(process.env.WEATHER_TIMEOUT_MS, 5000)),
    },
  },
  acquisition: {
    provider: parseProvider(process.env.FEED_PROVIDER),
    timeoutMs: Math.max(500, parseNumber(process.env.FEED_TIMEOUT_MS, 5000)),
    fallback,
    snapshotPath,
    simulatedAircraftCount: Math.max(1, parseNumber(process.env.SIMULATED_AIRCRAFT_COUNT, 15)),
    // 0 disables the freshness cache entirely
    freshnessWindowSeconds: Math.max(0, parseNumber(process.env.FRESHNESS_WINDOW_SECONDS, 30)),
    rateLimit: {
      baseBackoffSeconds: Math.max(1, parseNumber(process.env.FEED_BACKOFF_SECONDS, 60)),
      maxBackoffSeconds: Math.max(1, parseNumber(process.env.FEED_MAX_BACKOFF_SECONDS, 900)),
    },
  },
  reference: {
    name: process.env.REFERENCE_NAME || 'SBGR',
    latitude: parseFloatValue(process.env.REFERENCE_LAT, -23.4356),
    longitude: parseFloatValue(process.env.REFERENCE_LON, -46.4731),
    radiusNm: Math.max(1, parseFloatValue(process.env.REFERENCE_RADIUS_NM, 50)),
  },
  cors: {
    allowedOrigins: envAllowedOrigins.length > 0 ? envAllowedOrigins : defaultAllowedOrigins,
  },
};

export default config;
