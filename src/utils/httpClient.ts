import axios, { AxiosInstance } from 'axios';
import logger from './logger';

const DEFAULT_TIMEOUT_MS = Math.max(500, parseInt(process.env.HTTP_CLIENT_TIMEOUT_MS || '5000', 10));

/**
 * Shared axios instance for upstream feeds.
 * No retry interceptor: a failed feed call degrades to a fallback instead.
 */
const httpClient: AxiosInstance = axios.create({
  timeout: DEFAULT_TIMEOUT_MS,
  validateStatus: (status) => status >= 200 && status < 300,
  headers: {
    Accept: 'application/json',
    'User-Agent': 'FlightRiskBoard/1.0',
  },
});

httpClient.interceptors.response.use(
  (response) => response,
  (error: unknown) => {
    if (axios.isAxiosError(error)) {
      logger.debug('Upstream HTTP request failed', {
        url: error.config?.url,
        code: error.code,
        status: error.response?.status,
      });
    }
    return Promise.reject(error);
  },
);

export default httpClient;
