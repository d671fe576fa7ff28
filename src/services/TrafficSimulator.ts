import type { ITrafficSimulator } from '../types/services.types';
import type { BoundingBox, Observation } from '../types/observation.types';

export type RandomSource = () => number;

const AIRLINE_CODES = ['TAM', 'GLO', 'AZU', 'PTB', 'ARG', 'AAL', 'DAL', 'UAE'];

// Cruise-plausible ranges, SI units
const SPEED_RANGE_MPS: [number, number] = [180, 260];
const ALTITUDE_RANGE_M: [number, number] = [3000, 12000];
const VERTICAL_RATE_RANGE_MPS: [number, number] = [-10, 10];

export const SIMULATED_COUNTRY = 'Simulated';

/**
 * Synthetic traffic for when neither the live feed nor a snapshot is available.
 * Every generated observation satisfies the Observation invariants.
 */
export class TrafficSimulator implements ITrafficSimulator {
  constructor(private readonly random: RandomSource = Math.random) {}

  private between([min, max]: [number, number]): number {
    return min + this.random() * (max - min);
  }

  private pick<T>(items: readonly T[]): T {
    const index = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    return items[index];
  }

  private icao24(): string {
    return Math.floor(this.random() * 0xffffff).toString(16).padStart(6, '0');
  }

  private callsign(): string {
    const flightNumber = 100 + Math.floor(this.random() * 9900);
    return `${this.pick(AIRLINE_CODES)}${flightNumber}`;
  }

  generate(region: BoundingBox, count: number): Observation[] {
    return Array.from({ length: Math.max(0, count) }, () => ({
      icao24: this.icao24(),
      callsign: this.callsign(),
      latitude: this.between([region.lamin, region.lamax]),
      longitude: this.between([region.lomin, region.lomax]),
      groundSpeedMps: this.between(SPEED_RANGE_MPS),
      altitudeM: this.between(ALTITUDE_RANGE_M),
      verticalRateMps: this.between(VERTICAL_RATE_RANGE_MPS),
      originCountry: SIMULATED_COUNTRY,
      onGround: false,
    }));
  }
}

const trafficSimulator = new TrafficSimulator();

export default trafficSimulator;
