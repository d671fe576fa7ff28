import logger from '../utils/logger';
import { systemClock, type Clock } from '../utils/clock';

export interface RateLimitStatus {
  isRateLimited: boolean;
  blockedUntil: string | null;
  secondsUntilRetry: number | null;
  consecutiveFailures: number;
}

export interface RateLimitOptions {
  baseBackoffSeconds: number;
  maxBackoffSeconds: number;
}

/**
 * Back-off bookkeeping for one upstream feed.
 * After a 429 the feed is not called again until the back-off expires.
 */
export class RateLimitManager {
  private blockedUntil: number | null = null; // Timestamp when we can retry

  private consecutiveFailures: number = 0;

  constructor(
    private readonly feedName: string,
    private readonly options: RateLimitOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Check if we're currently rate limited
   */
  isRateLimited(): boolean {
    if (this.blockedUntil === null) return false;

    const now = this.clock();
    if (now < this.blockedUntil) {
      logger.debug('Feed still rate limited', {
        feed: this.feedName,
        secondsRemaining: Math.ceil((this.blockedUntil - now) / 1000),
        blockedUntil: new Date(this.blockedUntil).toISOString(),
      });
      return true;
    }

    // Rate limit has expired; failures are kept so a repeat 429 backs off longer
    this.blockedUntil = null;
    logger.info('Feed rate limit has expired, resuming requests', { feed: this.feedName });
    return false;
  }

  /**
   * Get seconds until we can retry
   */
  getSecondsUntilRetry(): number | null {
    if (this.blockedUntil === null) return null;

    const now = this.clock();
    if (now >= this.blockedUntil) return 0;

    return Math.ceil((this.blockedUntil - now) / 1000);
  }

  /**
   * Record a rate limit hit
   */
  recordRateLimit(retryAfterSeconds: number | null = null): void {
    this.consecutiveFailures++;

    let backoffSeconds: number;
    if (retryAfterSeconds && retryAfterSeconds > 0) {
      // Use the API's retry-after if provided
      backoffSeconds = retryAfterSeconds;
    } else {
      backoffSeconds = Math.min(
        this.options.baseBackoffSeconds * 2 ** (this.consecutiveFailures - 1),
        this.options.maxBackoffSeconds,
      );
    }

    this.blockedUntil = this.clock() + backoffSeconds * 1000;
    logger.warn('Feed rate limit hit', {
      feed: this.feedName,
      backoffSeconds,
      fromRetryAfter: Boolean(retryAfterSeconds && retryAfterSeconds > 0),
      consecutiveFailures: this.consecutiveFailures,
      retryAt: new Date(this.blockedUntil).toISOString(),
    });
  }

  /**
   * Record a successful request (resets consecutive failures)
   */
  recordSuccess(): void {
    if (this.consecutiveFailures > 0) {
      logger.info('Feed request succeeded, resetting failure count', {
        feed: this.feedName,
        previousFailures: this.consecutiveFailures,
      });
      this.consecutiveFailures = 0;
    }
    this.blockedUntil = null;
  }

  getStatus(): RateLimitStatus {
    return {
      isRateLimited: this.isRateLimited(),
      blockedUntil: this.blockedUntil !== null ? new Date(this.blockedUntil).toISOString() : null,
      secondsUntilRetry: this.getSecondsUntilRetry(),
      consecutiveFailures: this.consecutiveFailures,
    };
  }
}

export default RateLimitManager;
