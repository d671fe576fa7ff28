import type { ZodType } from 'zod';
import logger from '../utils/logger';
import httpClient from '../utils/httpClient';
import { classifyRequestError, malformedPayload } from '../utils/feedError';
import { err, ok, type Result } from '../utils/result';
import type { RateLimitManager, RateLimitStatus } from './RateLimitManager';
import type { IFeedProvider } from '../types/services.types';
import type {
  BoundingBox, FeedError, RawObservationBatch,
} from '../types/observation.types';

export interface FeedRequest {
  url: string;
  params?: Record<string, number>;
  headers?: Record<string, string>;
}

/**
 * One bounded-timeout GET per call, no retries.
 * Every failure comes back as a FeedError so the caller can degrade.
 */
export abstract class FeedService<TPayload> implements IFeedProvider {
  abstract readonly name: 'opensky' | 'adsb';

  protected constructor(
    protected readonly rateLimitManager: RateLimitManager,
    private readonly timeoutMs: number,
    private readonly payloadSchema: ZodType<TPayload>,
  ) {}

  protected abstract buildRequest(region: BoundingBox): FeedRequest;

  protected abstract toBatch(payload: TPayload): RawObservationBatch;

  getRateLimitStatus(): RateLimitStatus {
    return this.rateLimitManager.getStatus();
  }

  async fetchStates(region: BoundingBox): Promise<Result<RawObservationBatch, FeedError>> {
    if (this.rateLimitManager.isRateLimited()) {
      return err({
        kind: 'rate_limited',
        message: `${this.name} feed rate limited`,
        retryAfterSeconds: this.rateLimitManager.getSecondsUntilRetry(),
      });
    }

    const request = this.buildRequest(region);
    let data: unknown;
    try {
      const response = await httpClient.get<unknown>(request.url, {
        params: request.params,
        headers: request.headers,
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      const feedError = classifyRequestError(error);
      if (feedError.kind === 'rate_limited') {
        this.rateLimitManager.recordRateLimit(feedError.retryAfterSeconds ?? null);
      }
      logger.warn('Aircraft feed request failed', {
        feed: this.name,
        kind: feedError.kind,
        status: feedError.status,
        error: feedError.message,
      });
      return err(feedError);
    }

    this.rateLimitManager.recordSuccess();

    const parsed = this.payloadSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Aircraft feed returned an unexpected payload', {
        feed: this.name,
        issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message),
      });
      return err(malformedPayload(`${this.name} payload did not match the expected shape`));
    }

    const batch = this.toBatch(parsed.data);
    logger.debug('Aircraft feed call', {
      feed: this.name,
      records: batch.records?.length ?? 0,
    });
    return ok(batch);
  }
}

export default FeedService;
