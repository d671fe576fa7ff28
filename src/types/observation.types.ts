/**
 * Normalized aircraft observation.
 * Units are fixed at ingestion: metres, metres/second.
 */
export interface Observation {
  icao24: string;
  callsign: string;
  latitude: number;
  longitude: number;
  groundSpeedMps: number;
  altitudeM: number;
  verticalRateMps: number;
  originCountry: string;
  onGround: boolean;
}

export type Provenance = 'live' | 'cached_snapshot' | 'simulated';

export type ObservationSource = 'opensky' | 'adsb' | 'snapshot' | 'simulator';

export interface ObservationSet {
  provenance: Provenance;
  source: ObservationSource;
  observations: Observation[];
  fetchedAt: number; // ms
  reason?: string;
}

export interface BoundingBox {
  lamin: number;
  lomin: number;
  lamax: number;
  lomax: number;
}

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface ObservationFilters {
  minAltitudeM?: number;
  minSpeedMps?: number;
}

export type FeedErrorKind = 'transport' | 'timeout' | 'http' | 'rate_limited' | 'malformed';

export interface FeedError {
  kind: FeedErrorKind;
  message: string;
  status?: number;
  retryAfterSeconds?: number | null;
}

/**
 * Raw upstream records tagged with the shape they arrive in.
 * A null record list means the provider answered without any traffic.
 */
export type RawObservationBatch =
  | { shape: 'positional'; records: unknown[] | null }
  | { shape: 'named'; records: unknown[] | null };
