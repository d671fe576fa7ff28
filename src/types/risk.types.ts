export interface WeatherSnapshot {
  temperatureC: number;
  precipitationMm: number;
  windSpeedKmh: number;
  source: 'live' | 'fallback';
}

export interface Telemetry {
  distanceKm: number;
  speedKmh: number;
  altitudeFt: number;
  /** null when the aircraft is too slow for a meaningful estimate */
  etaMinutes: number | null;
}

export interface RiskAssessment {
  score: number;
  factors: string[];
}

export type RiskCategory = 'nominal' | 'moderate' | 'critical';

export interface Evaluation {
  telemetry: Telemetry;
  risk: RiskAssessment;
  weather: WeatherSnapshot;
}
