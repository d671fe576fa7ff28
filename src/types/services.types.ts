/**
 * Service interface type definitions
 * These define the contracts that services must implement
 */

import type {
  BoundingBox,
  Coordinate,
  FeedError,
  Observation,
  ObservationFilters,
  ObservationSet,
  RawObservationBatch,
} from './observation.types';
import type { Evaluation, WeatherSnapshot } from './risk.types';
import type { Result } from '../utils/result';
import type { RateLimitStatus } from '../services/RateLimitManager';

export interface IFeedProvider {
  readonly name: 'opensky' | 'adsb';
  fetchStates(region: BoundingBox): Promise<Result<RawObservationBatch, FeedError>>;
  getRateLimitStatus(): RateLimitStatus;
}

export interface ISnapshotSource {
  load(): Result<RawObservationBatch, Error>;
}

export interface ITrafficSimulator {
  generate(region: BoundingBox, count: number): Observation[];
}

export interface FetchOptions {
  useCache?: boolean;
}

export interface IAcquisitionService {
  fetch(region: BoundingBox, filters?: ObservationFilters, options?: FetchOptions): Promise<ObservationSet>;
}

export interface IWeatherService {
  getCurrent(latitude: number, longitude: number): Promise<WeatherSnapshot>;
}

export interface IRiskEngine {
  evaluate(observation: Observation, destination: Coordinate): Promise<Evaluation>;
}
