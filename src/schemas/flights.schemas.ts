import { z } from 'zod';
import config from '../config';
import { boundingBoxAround } from '../utils/geo';
import type {
  BoundingBox, Coordinate, ObservationFilters,
} from '../types/observation.types';

const queryBoolean = z.enum(['true', 'false']).transform((value) => value === 'true');

const latitude = z.coerce.number().min(-90).max(90);
const longitude = z.coerce.number().min(-180).max(180);

const regionFields = {
  lamin: latitude.optional(),
  lomin: longitude.optional(),
  lamax: latitude.optional(),
  lomax: longitude.optional(),
  minAltitudeM: z.coerce.number().min(0).optional(),
  minSpeedMps: z.coerce.number().min(0).optional(),
  useCache: queryBoolean.optional(),
};

type RegionFields = {
  lamin?: number;
  lomin?: number;
  lamax?: number;
  lomax?: number;
};

const checkRegion = (query: RegionFields, ctx: z.RefinementCtx): void => {
  const values = [query.lamin, query.lomin, query.lamax, query.lomax];
  const provided = values.filter((value) => value !== undefined).length;
  if (provided !== 0 && provided !== 4) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'lamin, lomin, lamax and lomax must be given together',
    });
    return;
  }
  if (query.lamin !== undefined && query.lamax !== undefined && query.lamin >= query.lamax) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'lamin must be lower than lamax', path: ['lamin'] });
  }
  if (query.lomin !== undefined && query.lomax !== undefined && query.lomin >= query.lomax) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'lomin must be lower than lomax', path: ['lomin'] });
  }
};

export const flightsQuerySchema = z.object({
  ...regionFields,
  sort: z.enum(['altitude']).optional(),
}).superRefine(checkRegion);

export const exportQuerySchema = z.object({
  ...regionFields,
  details: queryBoolean.optional(),
}).superRefine(checkRegion);

export const evaluateQuerySchema = z.object({
  ...regionFields,
  destLat: latitude.optional(),
  destLon: longitude.optional(),
}).superRefine((query, ctx) => {
  checkRegion(query, ctx);
  if ((query.destLat === undefined) !== (query.destLon === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'destLat and destLon must be given together',
    });
  }
});

export const callsignParamsSchema = z.object({
  callsign: z.string().trim().min(2).max(10),
});

export const weatherQuerySchema = z.object({
  lat: latitude,
  lon: longitude,
});

export type FlightsQuery = z.infer<typeof flightsQuerySchema>;

/**
 * Requested box, or the box around the configured reference point
 */
export function resolveRegion(query: RegionFields): BoundingBox {
  const {
    lamin, lomin, lamax, lomax,
  } = query;
  if (lamin !== undefined && lomin !== undefined && lamax !== undefined && lomax !== undefined) {
    return {
      lamin, lomin, lamax, lomax,
    };
  }
  return boundingBoxAround(
    { latitude: config.reference.latitude, longitude: config.reference.longitude },
    config.reference.radiusNm,
  );
}

export function resolveFilters(query: ObservationFilters): ObservationFilters {
  const filters: ObservationFilters = {};
  if (query.minAltitudeM !== undefined) {
    filters.minAltitudeM = query.minAltitudeM;
  }
  if (query.minSpeedMps !== undefined) {
    filters.minSpeedMps = query.minSpeedMps;
  }
  return filters;
}

export function resolveDestination(query: { destLat?: number; destLon?: number }): Coordinate {
  if (query.destLat !== undefined && query.destLon !== undefined) {
    return { latitude: query.destLat, longitude: query.destLon };
  }
  return { latitude: config.reference.latitude, longitude: config.reference.longitude };
}
