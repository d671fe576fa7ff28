import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import acquisitionService from '../../services/AcquisitionService';
import riskEngine from '../../services/RiskEngine';
import {
  evaluateFlight, exportFlights, getCallsigns, getFlights,
} from '../flights.routes';
import {
  SAO_PAULO_BOX,
  buildObservation,
  buildObservationSet,
} from '../../__tests__/fixtures/aircraftFixtures';
import type { Evaluation } from '../../types/risk.types';

jest.mock('../../services/AcquisitionService', () => ({
  __esModule: true,
  default: {
    fetch: jest.fn(),
    getProviderName: jest.fn(),
    getRateLimitStatus: jest.fn(),
  },
}));
jest.mock('../../services/RiskEngine', () => ({
  __esModule: true,
  default: {
    evaluate: jest.fn(),
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

const mockFetch = jest.mocked(acquisitionService.fetch);
const mockEvaluate = jest.mocked(riskEngine.evaluate);

const FETCHED_AT = Date.UTC(2024, 4, 1, 12, 0, 0);

const boxQuery = {
  lamin: '-24.5',
  lomin: '-47.5',
  lamax: '-22.5',
  lomax: '-45.5',
};

describe('flights routes', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: jest.Mock;

  const liveSet = buildObservationSet([
    buildObservation({ callsign: 'TAM3340' }),
    buildObservation({ icao24: 'e49b07', callsign: 'GLO1412', groundSpeedMps: 100 }),
  ], { fetchedAt: FETCHED_AT });

  beforeEach(() => {
    mockRequest = { query: {}, params: {} };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      send: jest.fn().mockReturnThis(),
      setHeader: jest.fn().mockReturnThis(),
    };
    mockNext = jest.fn();
  });

  const call = (
    handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
  ) => handler(mockRequest as Request, mockResponse as Response, mockNext);

  describe('GET /flights', () => {
    it('returns the set with its status line', async () => {
      mockFetch.mockResolvedValue(liveSet);
      mockRequest.query = { ...boxQuery, minAltitudeM: '3000', useCache: 'false' };

      await call(getFlights);

      expect(mockFetch).toHaveBeenCalledWith(SAO_PAULO_BOX, { minAltitudeM: 3000 }, { useCache: false });
      expect(mockResponse.json).toHaveBeenCalledWith({
        provenance: 'live',
        source: 'adsb',
        reason: null,
        fetchedAt: '2024-05-01T12:00:00.000Z',
        status: 'Live feed: 2 aircraft tracked',
        count: 2,
        observations: liveSet.observations,
      });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('orders rows by altitude, lowest first, when asked to', async () => {
      const cruising = buildObservation({ callsign: 'TAM3340', altitudeM: 11000 });
      const descending = buildObservation({ icao24: 'e49b07', callsign: 'GLO1412', altitudeM: 3000 });
      mockFetch.mockResolvedValue(buildObservationSet([cruising, descending], { fetchedAt: FETCHED_AT }));
      mockRequest.query = { sort: 'altitude' };

      await call(getFlights);

      expect(mockResponse.json).toHaveBeenCalledWith(expect.objectContaining({
        count: 2,
        observations: [descending, cruising],
      }));
    });

    it('rejects an unknown sort order', async () => {
      mockRequest.query = { sort: 'speed' };

      await call(getFlights);

      expect(mockFetch).not.toHaveBeenCalled();
      expect(mockNext).toHaveBeenCalledWith(expect.any(ZodError));
    });

    it('passes validation errors on', async () => {
      mockRequest.query = { lamin: '-24.5' };

      await call(getFlights);

      expect(mockFetch).not.toHaveBeenCalled();
      expect(mockNext).toHaveBeenCalledWith(expect.any(ZodError));
    });
  });

  describe('GET /flights/callsigns', () => {
    it('lists selectable callsigns', async () => {
      mockFetch.mockResolvedValue(liveSet);

      await call(getCallsigns);

      expect(mockResponse.json).toHaveBeenCalledWith({
        provenance: 'live',
        status: 'Live feed: 2 aircraft tracked',
        callsigns: ['TAM3340', 'GLO1412'],
      });
    });
  });

  describe('GET /flights/export.csv', () => {
    it('sends the set as a CSV attachment', async () => {
      mockFetch.mockResolvedValue(liveSet);
      mockRequest.query = { details: 'true' };

      await call(exportFlights);

      expect(mockResponse.setHeader).toHaveBeenCalledWith('Content-Type', 'text/csv; charset=utf-8');
      expect(mockResponse.setHeader).toHaveBeenCalledWith('Content-Disposition', 'attachment; filename="adsb_log.csv"');
      expect(mockResponse.status).toHaveBeenCalledWith(200);
      expect(mockResponse.send).toHaveBeenCalledWith([
        'callsign,speed_kmh,altitude_m,origin_country,vertical_rate_mps',
        'TAM3340,900.0,10668.0,Brazil,0.00',
        'GLO1412,360.0,10668.0,Brazil,0.00',
        '',
      ].join('\n'));
    });
  });

  describe('GET /flights/:callsign/evaluate', () => {
    const evaluation: Evaluation = {
      telemetry: {
        distanceKm: 31.2,
        speedKmh: 900,
        altitudeFt: 35000,
        etaMinutes: 2,
      },
      risk: { score: 70, factors: ['Strong wind (30.0 km/h)', 'Precipitation (1.0 mm)'] },
      weather: {
        temperatureC: 18,
        precipitationMm: 1,
        windSpeedKmh: 30,
        source: 'live',
      },
    };

    it('evaluates the selected aircraft against the destination', async () => {
      mockFetch.mockResolvedValue(liveSet);
      mockEvaluate.mockResolvedValue(evaluation);
      mockRequest.params = { callsign: 'tam3340' };
      mockRequest.query = { destLat: '-22.81', destLon: '-43.25' };

      await call(evaluateFlight);

      expect(mockEvaluate).toHaveBeenCalledWith(liveSet.observations[0], { latitude: -22.81, longitude: -43.25 });
      expect(mockResponse.json).toHaveBeenCalledWith({
        callsign: 'TAM3340',
        provenance: 'live',
        status: 'Live feed: 2 aircraft tracked',
        destination: { latitude: -22.81, longitude: -43.25 },
        observation: liveSet.observations[0],
        telemetry: evaluation.telemetry,
        risk: {
          score: 70,
          factors: ['Strong wind (30.0 km/h)', 'Precipitation (1.0 mm)'],
          category: 'critical',
        },
        weather: evaluation.weather,
      });
    });

    it('answers 404 for a callsign that is not in the set', async () => {
      mockFetch.mockResolvedValue(liveSet);
      mockRequest.params = { callsign: 'AZU4521' };

      await call(evaluateFlight);

      expect(mockEvaluate).not.toHaveBeenCalled();
      expect(mockResponse.status).toHaveBeenCalledWith(404);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: 'Callsign not found: AZU4521',
        provenance: 'live',
      });
    });

    it('passes evaluation failures on', async () => {
      const failure = new Error('evaluation failed');
      mockFetch.mockResolvedValue(liveSet);
      mockEvaluate.mockRejectedValue(failure);
      mockRequest.params = { callsign: 'TAM3340' };

      await call(evaluateFlight);

      expect(mockNext).toHaveBeenCalledWith(failure);
    });
  });
});
