/**
 * Configuration type definitions
 */

export interface ServerConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  host: string;
}

export type FeedProviderName = 'adsb' | 'opensky';

export type FallbackStrategy = 'snapshot' | 'simulated';

export interface ExternalApiConfig {
  opensky: {
    baseUrl: string;
    user?: string;
    pass?: string;
  };
  adsb: {
    baseUrl: string;
    maxRadiusNm: number;
  };
  weather: {
    baseUrl: string;
    timeoutMs: number;
  };
}

export interface AcquisitionConfig {
  provider: FeedProviderName;
  timeoutMs: number;
  fallback: FallbackStrategy;
  snapshotPath: string | null;
  simulatedAircraftCount: number;
  freshnessWindowSeconds: number;
  rateLimit: {
    baseBackoffSeconds: number;
    maxBackoffSeconds: number;
  };
}

export interface ReferencePointConfig {
  name: string;
  latitude: number;
  longitude: number;
  radiusNm: number;
}

export interface CorsConfig {
  allowedOrigins: string[];
}

export interface AppConfig {
  server: ServerConfig;
  external: ExternalApiConfig;
  acquisition: AcquisitionConfig;
  reference: ReferencePointConfig;
  cors: CorsConfig;
}
