import type { BoundingBox, Coordinate } from '../types/observation.types';

// WGS-84 ellipsoid
const WGS84_A = 6378137.0;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = WGS84_A * (1 - WGS84_F);

const MEAN_EARTH_RADIUS_KM = 6371.0088;
const VINCENTY_MAX_ITERATIONS = 200;
const VINCENTY_TOLERANCE = 1e-12;

export const KM_PER_NM = 1.852;
const NM_TO_LAT_DEGREES = 1 / 60;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Great-circle distance on a sphere of mean Earth radius (km)
 */
export function haversineKm(from: Coordinate, to: Coordinate): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);

  const h = Math.sin(dLat / 2) ** 2
    + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * MEAN_EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Vincenty inverse solution on the WGS-84 ellipsoid (km).
 * Returns null when the iteration does not converge, which happens for
 * nearly antipodal points.
 */
export function vincentyKm(from: Coordinate, to: Coordinate): number | null {
  if (from.latitude === to.latitude && from.longitude === to.longitude) {
    return 0;
  }

  const L = toRadians(to.longitude - from.longitude);
  const U1 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(from.latitude)));
  const U2 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(to.latitude)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  let sinSigma = 0;
  let cosSigma = 0;
  let sigma = 0;
  let cosSqAlpha = 0;
  let cos2SigmaM = 0;
  let converged = false;

  for (let iteration = 0; iteration < VINCENTY_MAX_ITERATIONS; iteration++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2
      + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2,
    );
    if (sinSigma === 0) {
      // Distinct points with zero sigma are antipodal
      return null;
    }
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha ** 2;
    // Equatorial line: cosSqAlpha = 0
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda = L + (1 - C) * WGS84_F * sinAlpha
      * (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)));

    if (Math.abs(lambda - previous) <= VINCENTY_TOLERANCE) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    return null;
  }

  const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2;
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  const deltaSigma = B * sinSigma * (cos2SigmaM + (B / 4) * (
    cosSigma * (-1 + 2 * cos2SigmaM ** 2)
    - (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma ** 2) * (-3 + 4 * cos2SigmaM ** 2)
  ));

  return (WGS84_B * A * (sigma - deltaSigma)) / 1000;
}

/**
 * Geodesic distance in km: Vincenty, or haversine where Vincenty fails
 */
export function distanceKm(from: Coordinate, to: Coordinate): number {
  return vincentyKm(from, to) ?? haversineKm(from, to);
}

export function boundingBoxAround(center: Coordinate, radiusNm: number): BoundingBox {
  const latRadius = radiusNm * NM_TO_LAT_DEGREES;
  const cosLat = Math.max(Math.cos(toRadians(center.latitude)), 0.0001);
  const lonRadius = radiusNm / (60 * cosLat);

  return {
    lamin: clamp(center.latitude - latRadius, -90, 90),
    lomin: clamp(center.longitude - lonRadius, -180, 180),
    lamax: clamp(center.latitude + latRadius, -90, 90),
    lomax: clamp(center.longitude + lonRadius, -180, 180),
  };
}

/**
 * Smallest center/radius query (whole nautical miles) that covers the box
 */
export function coveringCircle(region: BoundingBox): { center: Coordinate; radiusNm: number } {
  const center: Coordinate = {
    latitude: (region.lamin + region.lamax) / 2,
    longitude: (region.lomin + region.lomax) / 2,
  };
  const corners: Coordinate[] = [
    { latitude: region.lamin, longitude: region.lomin },
    { latitude: region.lamin, longitude: region.lomax },
    { latitude: region.lamax, longitude: region.lomin },
    { latitude: region.lamax, longitude: region.lomax },
  ];
  const farthestKm = Math.max(...corners.map((corner) => distanceKm(center, corner)));
  return { center, radiusNm: Math.max(1, Math.ceil(farthestKm / KM_PER_NM)) };
}
