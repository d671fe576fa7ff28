import NodeCache from 'node-cache';
import logger from '../utils/logger';
import { systemClock, type Clock } from '../utils/clock';
import type {
  BoundingBox, ObservationFilters, ObservationSet,
} from '../types/observation.types';

interface CacheEntry {
  storedAt: number;
  value: ObservationSet;
}

// Exact box: live rows are clipped to it
const keyCoordinate = (value: number): number => Number(value.toFixed(6));

export function buildCacheKey(region: BoundingBox, filters: ObservationFilters = {}): string {
  const latMin = keyCoordinate(region.lamin);
  const lonMin = keyCoordinate(region.lomin);
  const latMax = keyCoordinate(region.lamax);
  const lonMax = keyCoordinate(region.lomax);
  const minAltitude = filters.minAltitudeM ?? '-';
  const minSpeed = filters.minSpeedMps ?? '-';
  return `/area/${latMin}/${lonMin}/${latMax}/${lonMax}?alt=${minAltitude}&spd=${minSpeed}`;
}

/**
 * Freshness-window cache of acquisition results.
 * Age is measured with the injected clock; node-cache only evicts lazily,
 * so no timer is left running.
 */
export class ObservationCache {
  private readonly cache: NodeCache;

  constructor(
    private readonly windowMs: number,
    private readonly clock: Clock = systemClock,
    private readonly maxKeys: number = 1000,
  ) {
    this.cache = new NodeCache({
      stdTTL: Math.ceil(windowMs / 1000),
      checkperiod: 0,
      useClones: false,
    });
  }

  isEnabled(): boolean {
    return this.windowMs > 0;
  }

  get(key: string): ObservationSet | undefined {
    if (!this.isEnabled()) {
      return undefined;
    }
    const entry = this.cache.get<CacheEntry>(key);
    if (!entry) {
      return undefined;
    }
    if (this.clock() - entry.storedAt >= this.windowMs) {
      this.cache.del(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: ObservationSet): void {
    if (!this.isEnabled()) {
      return;
    }
    if (!this.cache.has(key) && this.cache.keys().length >= this.maxKeys) {
      this.flushAll('max keys reached');
    }
    this.cache.set<CacheEntry>(key, { storedAt: this.clock(), value });
  }

  flushAll(reason?: string): void {
    this.cache.flushAll();
    logger.info('Cleared observation cache', { reason: reason || 'unspecified' });
  }
}

export default ObservationCache;
