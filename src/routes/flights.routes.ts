import {
  Router, Request, Response, NextFunction,
} from 'express';
import acquisitionService from '../services/AcquisitionService';
import riskEngine from '../services/RiskEngine';
import { describeProvenance, riskCategory } from '../utils/presentation';
import { listCallsigns, selectObservation, sortByAltitude } from '../utils/selection';
import { toCsv } from '../utils/csvExport';
import {
  callsignParamsSchema,
  evaluateQuerySchema,
  exportQuerySchema,
  flightsQuerySchema,
  resolveDestination,
  resolveFilters,
  resolveRegion,
} from '../schemas/flights.schemas';
import type { Observation, ObservationSet } from '../types/observation.types';

const router = Router();

export const CSV_FILENAME = 'adsb_log.csv';

const serializeSet = (set: ObservationSet, observations: Observation[] = set.observations) => ({
  provenance: set.provenance,
  source: set.source,
  reason: set.reason ?? null,
  fetchedAt: new Date(set.fetchedAt).toISOString(),
  status: describeProvenance(set),
  count: observations.length,
  observations,
});

/**
 * Current observation set for a region
 * GET /api/flights?lamin&lomin&lamax&lomax&minAltitudeM&minSpeedMps&useCache&sort=altitude
 */
export async function getFlights(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = flightsQuerySchema.parse(req.query);
    const set = await acquisitionService.fetch(
      resolveRegion(query),
      resolveFilters(query),
      { useCache: query.useCache },
    );
    const observations = query.sort === 'altitude'
      ? sortByAltitude(set.observations)
      : set.observations;
    res.json(serializeSet(set, observations));
  } catch (error) {
    next(error);
  }
}

/**
 * Selectable callsigns for the current set
 * GET /api/flights/callsigns
 */
export async function getCallsigns(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = flightsQuerySchema.parse(req.query);
    const set = await acquisitionService.fetch(
      resolveRegion(query),
      resolveFilters(query),
      { useCache: query.useCache },
    );
    res.json({
      provenance: set.provenance,
      status: describeProvenance(set),
      callsigns: listCallsigns(set),
    });
  } catch (error) {
    next(error);
  }
}

/**
 * CSV download of the current set
 * GET /api/flights/export.csv?details=true
 */
export async function exportFlights(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = exportQuerySchema.parse(req.query);
    const set = await acquisitionService.fetch(
      resolveRegion(query),
      resolveFilters(query),
      { useCache: query.useCache },
    );
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${CSV_FILENAME}"`);
    res.status(200).send(toCsv(set.observations, { includeDetails: query.details === true }));
  } catch (error) {
    next(error);
  }
}

/**
 * Telemetry and delay risk for one aircraft of the current set
 * GET /api/flights/:callsign/evaluate?destLat&destLon
 */
export async function evaluateFlight(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { callsign } = callsignParamsSchema.parse(req.params);
    const query = evaluateQuerySchema.parse(req.query);
    const set = await acquisitionService.fetch(
      resolveRegion(query),
      resolveFilters(query),
      { useCache: query.useCache },
    );

    const observation = selectObservation(set, callsign);
    if (!observation) {
      res.status(404).json({
        error: `Callsign not found: ${callsign}`,
        provenance: set.provenance,
      });
      return;
    }

    const destination = resolveDestination(query);
    const { telemetry, risk, weather } = await riskEngine.evaluate(observation, destination);

    res.json({
      callsign: observation.callsign,
      provenance: set.provenance,
      status: describeProvenance(set),
      destination,
      observation,
      telemetry,
      risk: {
        score: risk.score,
        factors: risk.factors,
        category: riskCategory(risk.score),
      },
      weather,
    });
  } catch (error) {
    next(error);
  }
}

router.get('/flights', getFlights);
router.get('/flights/callsigns', getCallsigns);
router.get('/flights/export.csv', exportFlights);
router.get('/flights/:callsign/evaluate', evaluateFlight);

export default router;
