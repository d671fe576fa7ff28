import logger from '../utils/logger';
import { distanceKm } from '../utils/geo';
import { FEET_TO_METERS, MPS_TO_KMH } from '../utils/aircraftState';
import weatherService, { FALLBACK_WEATHER } from './WeatherService';
import type { IRiskEngine, IWeatherService } from '../types/services.types';
import type { Coordinate, Observation } from '../types/observation.types';
import type {
  Evaluation, RiskAssessment, Telemetry, WeatherSnapshot,
} from '../types/risk.types';

// At or below this ground speed an ETA is meaningless (taxiing, holding, bad data)
export const ETA_MIN_SPEED_KMH = 10;

interface RiskRule {
  points: number;
  applies(telemetry: Telemetry, weather: WeatherSnapshot): boolean;
  factor?(telemetry: Telemetry, weather: WeatherSnapshot): string;
}

/**
 * Additive delay-risk rules. Every matching rule fires; list order is
 * factor order.
 */
export const RISK_RULES: readonly RiskRule[] = [
  {
    points: 30,
    applies: (_telemetry, weather) => weather.windSpeedKmh > 25,
    factor: (_telemetry, weather) => `Strong wind (${weather.windSpeedKmh.toFixed(1)} km/h)`,
  },
  {
    points: 40,
    applies: (_telemetry, weather) => weather.precipitationMm > 0.5,
    factor: (_telemetry, weather) => `Precipitation (${weather.precipitationMm.toFixed(1)} mm)`,
  },
  {
    points: 20,
    applies: (telemetry) => telemetry.speedKmh < 600 && telemetry.altitudeFt > 20000,
    factor: () => 'Low speed at cruise altitude',
  },
  {
    // Scores without a factor line
    points: 10,
    applies: (telemetry) => telemetry.etaMinutes !== null && telemetry.etaMinutes > 120,
  },
];

export function computeTelemetry(observation: Observation, destination: Coordinate): Telemetry {
  const distance = distanceKm(
    { latitude: observation.latitude, longitude: observation.longitude },
    destination,
  );
  const speedKmh = observation.groundSpeedMps * MPS_TO_KMH;
  const etaMinutes = speedKmh > ETA_MIN_SPEED_KMH
    ? Math.trunc((distance / speedKmh) * 60)
    : null;

  return {
    distanceKm: distance,
    speedKmh,
    altitudeFt: observation.altitudeM / FEET_TO_METERS,
    etaMinutes,
  };
}

export function assessRisk(telemetry: Telemetry, weather: WeatherSnapshot): RiskAssessment {
  let score = 0;
  const factors: string[] = [];

  RISK_RULES.forEach((rule) => {
    if (!rule.applies(telemetry, weather)) {
      return;
    }
    score += rule.points;
    if (rule.factor) {
      factors.push(rule.factor(telemetry, weather));
    }
  });

  return { score, factors };
}

export class RiskEngine implements IRiskEngine {
  constructor(private readonly weather: IWeatherService) {}

  private async weatherAt(destination: Coordinate): Promise<WeatherSnapshot> {
    try {
      return await this.weather.getCurrent(destination.latitude, destination.longitude);
    } catch (error) {
      logger.warn('Weather lookup threw, continuing with fallback snapshot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { ...FALLBACK_WEATHER };
    }
  }

  async evaluate(observation: Observation, destination: Coordinate): Promise<Evaluation> {
    const telemetry = computeTelemetry(observation, destination);
    const weather = await this.weatherAt(destination);
    const risk = assessRisk(telemetry, weather);

    logger.debug('Evaluated aircraft', {
      callsign: observation.callsign,
      distanceKm: Number(telemetry.distanceKm.toFixed(1)),
      etaMinutes: telemetry.etaMinutes,
      score: risk.score,
      weatherSource: weather.source,
    });

    return { telemetry, risk, weather };
  }
}

const riskEngine = new RiskEngine(weatherService);

export default riskEngine;
