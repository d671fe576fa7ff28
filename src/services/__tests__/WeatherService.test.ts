import { AxiosError, AxiosHeaders } from 'axios';
import httpClient from '../../utils/httpClient';
import { FALLBACK_WEATHER, WeatherService } from '../WeatherService';

jest.mock('../../utils/httpClient', () => ({
  __esModule: true,
  default: {
    get: jest.fn(),
  },
}));
jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const mockGet = jest.mocked(httpClient.get);

describe('WeatherService', () => {
  const service = new WeatherService({ baseUrl: 'https://weather.test/v1', timeoutMs: 3000 });

  it('requests current conditions for the point', async () => {
    mockGet.mockResolvedValue({
      data: {
        latitude: -23.4375,
        longitude: -46.5,
        current: {
          time: '2024-05-01T12:00',
          temperature_2m: 21.4,
          precipitation: 1.2,
          wind_speed_10m: 31.7,
        },
      },
    });

    const weather = await service.getCurrent(-23.43561, -46.47312);

    expect(mockGet).toHaveBeenCalledWith('https://weather.test/v1/forecast', {
      params: {
        latitude: -23.4356,
        longitude: -46.4731,
        current: 'temperature_2m,precipitation,wind_speed_10m',
      },
      timeout: 3000,
    });
    expect(weather).toEqual({
      temperatureC: 21.4,
      precipitationMm: 1.2,
      windSpeedKmh: 31.7,
      source: 'live',
    });
  });

  it('falls back to benign values when the request fails', async () => {
    const config = { headers: new AxiosHeaders() };
    mockGet.mockRejectedValue(new AxiosError('timeout of 3000ms exceeded', 'ECONNABORTED', config));

    const weather = await service.getCurrent(-23.4356, -46.4731);

    expect(weather).toEqual({
      temperatureC: 0,
      precipitationMm: 0,
      windSpeedKmh: 0,
      source: 'fallback',
    });
    expect(weather).not.toBe(FALLBACK_WEATHER);
  });

  it('falls back when the body lacks current conditions', async () => {
    mockGet.mockResolvedValue({ data: { hourly: {} } });

    const weather = await service.getCurrent(-23.4356, -46.4731);

    expect(weather.source).toBe('fallback');
  });

  it('exposes the failure kind through lookup', async () => {
    mockGet.mockRejectedValue(new Error('getaddrinfo ENOTFOUND weather.test'));

    const result = await service.lookup(-23.4356, -46.4731);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'getaddrinfo ENOTFOUND weather.test' },
    });
  });
});
