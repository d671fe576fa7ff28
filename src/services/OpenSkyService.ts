import { z } from 'zod';
import config from '../config';
import { FeedService, type FeedRequest } from './FeedService';
import { RateLimitManager } from './RateLimitManager';
import type { BoundingBox, RawObservationBatch } from '../types/observation.types';

const openSkyResponseSchema = z.object({
  time: z.number().optional(),
  // null when the box holds no traffic
  states: z.array(z.unknown()).nullable().optional(),
});

export type OpenSkyResponse = z.infer<typeof openSkyResponseSchema>;

export interface OpenSkyOptions {
  baseUrl: string;
  user?: string;
  pass?: string;
  timeoutMs: number;
}

/**
 * Service for the OpenSky Network `states/all` endpoint.
 * State vectors arrive positionally in metres and m/s.
 */
export class OpenSkyService extends FeedService<OpenSkyResponse> {
  readonly name = 'opensky' as const;

  constructor(private readonly options: OpenSkyOptions, rateLimitManager: RateLimitManager) {
    super(rateLimitManager, options.timeoutMs, openSkyResponseSchema);
  }

  /**
   * Basic auth when credentials are configured, anonymous otherwise
   */
  private getAuthHeader(): Record<string, string> {
    if (!this.options.user || !this.options.pass) {
      return {};
    }
    const auth = Buffer.from(`${this.options.user}:${this.options.pass}`).toString('base64');
    return { Authorization: `Basic ${auth}` };
  }

  protected buildRequest(region: BoundingBox): FeedRequest {
    const {
      lamin, lomin, lamax, lomax,
    } = region;
    return {
      url: `${this.options.baseUrl}/states/all`,
      params: {
        lamin,
        lomin,
        lamax,
        lomax,
      },
      headers: this.getAuthHeader(),
    };
  }

  protected toBatch(payload: OpenSkyResponse): RawObservationBatch {
    return { shape: 'positional', records: payload.states ?? null };
  }
}

const openSkyService = new OpenSkyService(
  {
    baseUrl: config.external.opensky.baseUrl,
    user: config.external.opensky.user,
    pass: config.external.opensky.pass,
    timeoutMs: config.acquisition.timeoutMs,
  },
  new RateLimitManager('opensky', config.acquisition.rateLimit),
);

export default openSkyService;
