import { Router, Request, Response } from 'express';
import acquisitionService from '../services/AcquisitionService';
import config from '../config';

const router = Router();

/**
 * Health check endpoint for load balancers and monitoring.
 * A rate-limited feed is still healthy: acquisition keeps serving fallbacks.
 */
export function getHealth(_req: Request, res: Response): void {
  const rateLimitStatus = acquisitionService.getRateLimitStatus();

  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    service: 'flight-risk-board',
    feed: {
      provider: acquisitionService.getProviderName(),
      fallback: config.acquisition.fallback,
      freshnessWindowSeconds: config.acquisition.freshnessWindowSeconds,
      rateLimited: rateLimitStatus.isRateLimited,
      blockedUntil: rateLimitStatus.blockedUntil,
      secondsUntilRetry: rateLimitStatus.secondsUntilRetry,
      consecutiveFailures: rateLimitStatus.consecutiveFailures,
    },
  });
}

router.get('/health', getHealth);

export default router;
