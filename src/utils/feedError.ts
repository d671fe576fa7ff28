import axios from 'axios';
import type { FeedError } from '../types/observation.types';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function parseRetryAfter(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const parsed = parseInt(String(value), 10);
  return Number.isNaN(parsed) || parsed <= 0 ? null : parsed;
}

/**
 * Classify a failed upstream request. Both transport and provider failures
 * end up as "feed unavailable"; the kind only feeds logs and back-off.
 */
export function classifyRequestError(error: unknown): FeedError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429) {
      const headers = error.response?.headers;
      return {
        kind: 'rate_limited',
        message: 'Upstream feed rate limited',
        status,
        retryAfterSeconds: parseRetryAfter(headers?.['retry-after'])
          ?? parseRetryAfter(headers?.['x-rate-limit-retry-after-seconds']),
      };
    }
    if (status !== undefined) {
      return { kind: 'http', message: `Upstream feed returned HTTP ${status}`, status };
    }
    if ((error.code && TIMEOUT_CODES.has(error.code)) || error.message.includes('timeout')) {
      return { kind: 'timeout', message: error.message };
    }
    return { kind: 'transport', message: error.message };
  }
  return {
    kind: 'transport',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function malformedPayload(message: string): FeedError {
  return { kind: 'malformed', message };
}

export function describeFeedError(error: FeedError): string {
  return error.status !== undefined ? `${error.kind} (${error.status})` : error.kind;
}
