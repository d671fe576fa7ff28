import type { ObservationSet } from '../types/observation.types';
import type { RiskCategory } from '../types/risk.types';

export function riskCategory(score: number): RiskCategory {
  if (score > 50) {
    return 'critical';
  }
  if (score > 20) {
    return 'moderate';
  }
  return 'nominal';
}

/**
 * Status line shown next to the data; provenance never changes the data itself
 */
export function describeProvenance(set: ObservationSet): string {
  if (set.observations.length === 0 && set.provenance === 'live') {
    return 'Live feed connected: no traffic in the selected area right now';
  }
  switch (set.provenance) {
    case 'live':
      return `Live feed: ${set.observations.length} aircraft tracked`;
    case 'cached_snapshot':
      return `Live feed unavailable (${set.reason ?? 'unknown'}): showing a fixed snapshot`;
    case 'simulated':
      return `Live feed unavailable (${set.reason ?? 'unknown'}): showing simulated traffic`;
    default: {
      const unreachable: never = set.provenance;
      return unreachable;
    }
  }
}
