import { z } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import httpClient from '../utils/httpClient';
import { classifyRequestError, malformedPayload } from '../utils/feedError';
import { err, ok, type Result } from '../utils/result';
import type { IWeatherService } from '../types/services.types';
import type { FeedError } from '../types/observation.types';
import type { WeatherSnapshot } from '../types/risk.types';

const CURRENT_FIELDS = 'temperature_2m,precipitation,wind_speed_10m';

const openMeteoResponseSchema = z.object({
  current: z.object({
    temperature_2m: z.number(),
    precipitation: z.number(),
    wind_speed_10m: z.number(), // km/h
  }),
});

/**
 * Benign values used whenever the lookup fails: no risk rule fires on them
 */
export const FALLBACK_WEATHER: Readonly<WeatherSnapshot> = Object.freeze({
  temperatureC: 0,
  precipitationMm: 0,
  windSpeedKmh: 0,
  source: 'fallback',
});

export interface WeatherOptions {
  baseUrl: string;
  timeoutMs: number;
}

export class WeatherService implements IWeatherService {
  constructor(private readonly options: WeatherOptions) {}

  async lookup(latitude: number, longitude: number): Promise<Result<WeatherSnapshot, FeedError>> {
    let data: unknown;
    try {
      const response = await httpClient.get<unknown>(`${this.options.baseUrl}/forecast`, {
        params: {
          latitude: Number(latitude.toFixed(4)),
          longitude: Number(longitude.toFixed(4)),
          current: CURRENT_FIELDS,
        },
        timeout: this.options.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      return err(classifyRequestError(error));
    }

    const parsed = openMeteoResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(malformedPayload('Weather payload is missing current conditions'));
    }

    const { current } = parsed.data;
    return ok({
      temperatureC: current.temperature_2m,
      precipitationMm: current.precipitation,
      windSpeedKmh: current.wind_speed_10m,
      source: 'live',
    });
  }

  /**
   * Current conditions at a point; resolves to FALLBACK_WEATHER on any failure
   */
  async getCurrent(latitude: number, longitude: number): Promise<WeatherSnapshot> {
    const result = await this.lookup(latitude, longitude);
    if (result.ok) {
      return result.value;
    }

    logger.warn('Weather lookup failed, using fallback snapshot', {
      latitude,
      longitude,
      kind: result.error.kind,
      error: result.error.message,
    });
    return { ...FALLBACK_WEATHER };
  }
}

const weatherService = new WeatherService({
  baseUrl: config.external.weather.baseUrl,
  timeoutMs: config.external.weather.timeoutMs,
});

export default weatherService;
