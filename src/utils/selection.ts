import { MISSING_CALLSIGN } from './aircraftState';
import type { Observation, ObservationSet } from '../types/observation.types';

const normalizeCallsign = (callsign: string): string => callsign.trim().toUpperCase();

/**
 * Distinct selectable callsigns (case-insensitive), in the order and
 * spelling they first appear
 */
export function listCallsigns(set: ObservationSet): string[] {
  const seen = new Set<string>();
  const callsigns: string[] = [];
  set.observations.forEach(({ callsign }) => {
    const trimmed = callsign.trim();
    const normalized = normalizeCallsign(trimmed);
    if (!trimmed || trimmed === MISSING_CALLSIGN || seen.has(normalized)) {
      return;
    }
    seen.add(normalized);
    callsigns.push(trimmed);
  });
  return callsigns;
}

/**
 * First observation carrying the callsign (case-insensitive)
 */
export function selectObservation(set: ObservationSet, callsign: string): Observation | undefined {
  const wanted = normalizeCallsign(callsign);
  if (!wanted) {
    return undefined;
  }
  return set.observations.find((observation) => normalizeCallsign(observation.callsign) === wanted);
}

/**
 * Lowest aircraft first; ties keep feed order
 */
export function sortByAltitude(observations: Observation[]): Observation[] {
  return [...observations].sort((a, b) => a.altitudeM - b.altitudeM);
}
