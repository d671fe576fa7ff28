import config from '../config';
import logger from '../utils/logger';
import { systemClock, type Clock } from '../utils/clock';
import { err, type Result } from '../utils/result';
import { classifyRequestError, describeFeedError } from '../utils/feedError';
import {
  applyFilters, isWithinBounds, normalizeBatch,
} from '../utils/aircraftState';
import { ObservationCache, buildCacheKey } from './ObservationCache';
import openSkyService from './OpenSkyService';
import adsbFeedService from './AdsbFeedService';
import snapshotSource from './SnapshotSource';
import trafficSimulator from './TrafficSimulator';
import type { RateLimitStatus } from './RateLimitManager';
import type {
  FetchOptions,
  IAcquisitionService,
  IFeedProvider,
  ISnapshotSource,
  ITrafficSimulator,
} from '../types/services.types';
import type {
  BoundingBox,
  FeedError,
  ObservationFilters,
  ObservationSet,
  RawObservationBatch,
} from '../types/observation.types';

export interface AcquisitionDependencies {
  provider: IFeedProvider;
  snapshot: ISnapshotSource | null;
  simulator: ITrafficSimulator;
  cache: ObservationCache;
  simulatedCount: number;
  clock?: Clock;
}

/**
 * Produces observation sets for a region.
 * Tries the live feed once; on any feed failure degrades to the configured
 * snapshot, else to simulated traffic. Never rejects.
 */
export class AcquisitionService implements IAcquisitionService {
  // Identical concurrent calls share one upstream request
  private pendingRequests: Map<string, Promise<ObservationSet>> = new Map();

  private readonly clock: Clock;

  constructor(private readonly deps: AcquisitionDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  getProviderName(): IFeedProvider['name'] {
    return this.deps.provider.name;
  }

  getRateLimitStatus(): RateLimitStatus {
    return this.deps.provider.getRateLimitStatus();
  }

  async fetch(
    region: BoundingBox,
    filters: ObservationFilters = {},
    options: FetchOptions = {},
  ): Promise<ObservationSet> {
    const useCache = options.useCache !== false && this.deps.cache.isEnabled();
    if (!useCache) {
      return this.acquire(region, filters);
    }

    const cacheKey = buildCacheKey(region, filters);
    const cached = this.deps.cache.get(cacheKey);
    if (cached) {
      logger.debug('Serving observation set from freshness cache', {
        cacheKey,
        provenance: cached.provenance,
      });
      return cached;
    }

    const pendingRequest = this.pendingRequests.get(cacheKey);
    if (pendingRequest) {
      logger.debug(`Reusing pending acquisition for ${cacheKey}`);
      return pendingRequest;
    }

    const requestPromise = this.acquire(region, filters);
    this.pendingRequests.set(cacheKey, requestPromise);

    try {
      const result = await requestPromise;
      this.deps.cache.set(cacheKey, result);
      return result;
    } finally {
      this.pendingRequests.delete(cacheKey);
    }
  }

  private async acquire(region: BoundingBox, filters: ObservationFilters): Promise<ObservationSet> {
    const { provider } = this.deps;

    let result: Result<RawObservationBatch, FeedError>;
    try {
      result = await provider.fetchStates(region);
    } catch (error) {
      result = err(classifyRequestError(error));
    }

    if (!result.ok) {
      return this.degrade(region, filters, result.error);
    }

    // Point queries return a circle; clip back to the requested box
    const inRegion = normalizeBatch(result.value).filter((observation) => isWithinBounds(observation, region));
    const observations = applyFilters(inRegion, filters);

    logger.info('Acquired live observations', {
      feed: provider.name,
      received: result.value.records?.length ?? 0,
      kept: observations.length,
    });

    return {
      provenance: 'live',
      source: provider.name,
      observations,
      fetchedAt: this.clock(),
    };
  }

  private degrade(
    region: BoundingBox,
    filters: ObservationFilters,
    feedError: FeedError,
  ): ObservationSet {
    const reason = describeFeedError(feedError);

    if (this.deps.snapshot) {
      const snapshot = this.deps.snapshot.load();
      if (snapshot.ok) {
        const observations = applyFilters(normalizeBatch(snapshot.value), filters);
        logger.warn('Live feed unavailable, serving fallback snapshot', {
          feed: this.deps.provider.name,
          reason,
          count: observations.length,
        });
        return {
          provenance: 'cached_snapshot',
          source: 'snapshot',
          observations,
          fetchedAt: this.clock(),
          reason,
        };
      }
      logger.warn('Fallback snapshot unavailable, generating simulated traffic', {
        error: snapshot.error.message,
      });
    }

    const observations = applyFilters(
      this.deps.simulator.generate(region, this.deps.simulatedCount),
      filters,
    );
    logger.warn('Live feed unavailable, serving simulated traffic', {
      feed: this.deps.provider.name,
      reason,
      count: observations.length,
    });
    return {
      provenance: 'simulated',
      source: 'simulator',
      observations,
      fetchedAt: this.clock(),
      reason,
    };
  }
}

const acquisitionService = new AcquisitionService({
  provider: config.acquisition.provider === 'opensky' ? openSkyService : adsbFeedService,
  snapshot: snapshotSource,
  simulator: trafficSimulator,
  cache: new ObservationCache(config.acquisition.freshnessWindowSeconds * 1000),
  simulatedCount: config.acquisition.simulatedAircraftCount,
});

export default acquisitionService;
