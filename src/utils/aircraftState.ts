import type {
  BoundingBox, Observation, ObservationFilters, RawObservationBatch,
} from '../types/observation.types';

/**
 * OpenSky state vector positions
 */
export const STATE_INDEX = {
  ICAO24: 0,
  CALLSIGN: 1,
  ORIGIN_COUNTRY: 2,
  TIME_POSITION: 3,
  LAST_CONTACT: 4,
  LONGITUDE: 5,
  LATITUDE: 6,
  BARO_ALTITUDE: 7,
  ON_GROUND: 8,
  VELOCITY: 9,
  TRUE_TRACK: 10,
  VERTICAL_RATE: 11,
  SENSORS: 12,
  GEO_ALTITUDE: 13,
  SQUAWK: 14,
  SPI: 15,
  POSITION_SOURCE: 16,
} as const;

// ADS-B exchange feeds report knots, feet and ft/min
export const KNOTS_TO_MPS = 1852 / 3600;
export const FEET_TO_METERS = 0.3048;
export const FPM_TO_MPS = 0.00508;
export const MPS_TO_KMH = 3.6;

export const MISSING_CALLSIGN = 'N/A';
export const UNKNOWN_COUNTRY = 'Unknown';

const isRecord = (value: unknown): value is Record<string, unknown> => (
  typeof value === 'object' && value !== null && !Array.isArray(value)
);

/**
 * Numeric coercion for feed fields: numbers and numeric strings pass,
 * everything else (null, "ground", objects) becomes 0.
 */
export function coerceNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function coerceCoordinate(value: unknown, limit: number): number | null {
  let parsed: number | null = null;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value.trim());
  }
  if (parsed === null || !Number.isFinite(parsed) || Math.abs(parsed) > limit) {
    return null;
  }
  return parsed;
}

const coerceString = (value: unknown): string | null => (
  typeof value === 'string' && value.trim() !== '' ? value.trim() : null
);

interface ObservationCandidate extends Omit<Observation, 'latitude' | 'longitude'> {
  latitude: number | null;
  longitude: number | null;
}

function finalize(candidate: ObservationCandidate): Observation | null {
  const { latitude, longitude } = candidate;
  if (latitude === null || longitude === null) {
    return null;
  }
  if (candidate.callsign === '' || candidate.callsign === MISSING_CALLSIGN) {
    return null;
  }
  // Non-positive altitude is treated as sensor noise
  if (!(candidate.altitudeM > 0)) {
    return null;
  }
  return { ...candidate, latitude, longitude };
}

/**
 * Map an OpenSky state vector (metres, m/s) to an Observation.
 * Returns null when the record breaks an Observation invariant.
 */
export function mapPositionalRecord(record: unknown): Observation | null {
  if (!Array.isArray(record)) {
    return null;
  }
  const values: unknown[] = record;

  return finalize({
    icao24: (coerceString(values[STATE_INDEX.ICAO24]) ?? '').toLowerCase(),
    callsign: coerceString(values[STATE_INDEX.CALLSIGN]) ?? MISSING_CALLSIGN,
    latitude: coerceCoordinate(values[STATE_INDEX.LATITUDE], 90),
    longitude: coerceCoordinate(values[STATE_INDEX.LONGITUDE], 180),
    groundSpeedMps: coerceNumber(values[STATE_INDEX.VELOCITY]),
    altitudeM: coerceNumber(values[STATE_INDEX.BARO_ALTITUDE]),
    verticalRateMps: coerceNumber(values[STATE_INDEX.VERTICAL_RATE]),
    originCountry: coerceString(values[STATE_INDEX.ORIGIN_COUNTRY]) ?? UNKNOWN_COUNTRY,
    onGround: values[STATE_INDEX.ON_GROUND] === true,
  });
}

/**
 * Map a named-field ADS-B record (`hex`, `flight`, `lat`, `lon`, `gs`,
 * `alt_baro`, `baro_rate`) to an Observation, converting knots, feet and
 * ft/min to SI units.
 */
export function mapNamedRecord(record: unknown): Observation | null {
  if (!isRecord(record)) {
    return null;
  }

  return finalize({
    icao24: (coerceString(record.hex) ?? '').toLowerCase(),
    callsign: coerceString(record.flight) ?? MISSING_CALLSIGN,
    latitude: coerceCoordinate(record.lat, 90),
    longitude: coerceCoordinate(record.lon, 180),
    groundSpeedMps: coerceNumber(record.gs) * KNOTS_TO_MPS,
    altitudeM: coerceNumber(record.alt_baro) * FEET_TO_METERS,
    verticalRateMps: coerceNumber(record.baro_rate) * FPM_TO_MPS,
    originCountry: coerceString(record.country) ?? UNKNOWN_COUNTRY,
    onGround: record.alt_baro === 'ground',
  });
}

export function normalizeBatch(batch: RawObservationBatch): Observation[] {
  if (!batch.records) {
    return [];
  }
  const mapper = batch.shape === 'positional' ? mapPositionalRecord : mapNamedRecord;
  const observations: Observation[] = [];
  batch.records.forEach((record) => {
    const observation = mapper(record);
    if (observation) {
      observations.push(observation);
    }
  });
  return observations;
}

export function applyFilters(observations: Observation[], filters: ObservationFilters = {}): Observation[] {
  const { minAltitudeM, minSpeedMps } = filters;
  return observations.filter((observation) => {
    if (minAltitudeM !== undefined && observation.altitudeM < minAltitudeM) {
      return false;
    }
    if (minSpeedMps !== undefined && observation.groundSpeedMps < minSpeedMps) {
      return false;
    }
    return true;
  });
}

export function isWithinBounds(observation: Observation, region: BoundingBox): boolean {
  return observation.latitude >= region.lamin
    && observation.latitude <= region.lamax
    && observation.longitude >= region.lomin
    && observation.longitude <= region.lomax;
}
