import { z } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import { coveringCircle } from '../utils/geo';
import { FeedService, type FeedRequest } from './FeedService';
import { RateLimitManager } from './RateLimitManager';
import type { BoundingBox, RawObservationBatch } from '../types/observation.types';

/**
 * Named-field record as served by adsb.lol / airplanes.live.
 * Only the fields we read are listed; values are coerced later.
 */
export interface AdsbAircraft {
  hex?: string;
  flight?: string;
  lat?: number | string;
  lon?: number | string;
  gs?: number | string;
  alt_baro?: number | string; // feet, or "ground"
  baro_rate?: number | string; // ft/min
  track?: number;
  squawk?: string;
  category?: string;
}

const adsbResponseSchema = z.object({
  ac: z.array(z.unknown()).nullable().optional(),
  total: z.number().optional(),
  now: z.number().optional(),
});

export type AdsbResponse = z.infer<typeof adsbResponseSchema>;

export interface AdsbOptions {
  baseUrl: string;
  maxRadiusNm: number;
  timeoutMs: number;
}

/**
 * Service for the ADS-B exchange v2 point query.
 * The bounding box is turned into its covering circle; callers clip the
 * result back to the box after normalization.
 */
export class AdsbFeedService extends FeedService<AdsbResponse> {
  readonly name = 'adsb' as const;

  constructor(private readonly options: AdsbOptions, rateLimitManager: RateLimitManager) {
    super(rateLimitManager, options.timeoutMs, adsbResponseSchema);
  }

  protected buildRequest(region: BoundingBox): FeedRequest {
    const { center, radiusNm: requestedRadiusNm } = coveringCircle(region);
    // Clamp radius to max allowed
    const radiusNm = Math.min(requestedRadiusNm, this.options.maxRadiusNm);
    if (radiusNm !== requestedRadiusNm) {
      logger.warn(`Radius clamped from ${requestedRadiusNm}nm to ${radiusNm}nm (max: ${this.options.maxRadiusNm}nm)`);
    }

    const lat = center.latitude.toFixed(4);
    const lon = center.longitude.toFixed(4);
    return {
      url: `${this.options.baseUrl}/lat/${lat}/lon/${lon}/dist/${radiusNm}`,
    };
  }

  protected toBatch(payload: AdsbResponse): RawObservationBatch {
    return { shape: 'named', records: payload.ac ?? null };
  }
}

const adsbFeedService = new AdsbFeedService(
  {
    baseUrl: config.external.adsb.baseUrl,
    maxRadiusNm: config.external.adsb.maxRadiusNm,
    timeoutMs: config.acquisition.timeoutMs,
  },
  new RateLimitManager('adsb', config.acquisition.rateLimit),
);

export default adsbFeedService;
