import {
  Router, Request, Response, NextFunction,
} from 'express';
import weatherService from '../services/WeatherService';
import { weatherQuerySchema } from '../schemas/flights.schemas';

const router = Router();

/**
 * Current conditions at a point; falls back to the benign snapshot
 * GET /api/weather?lat&lon
 */
export async function getWeather(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { lat, lon } = weatherQuerySchema.parse(req.query);
    const weather = await weatherService.getCurrent(lat, lon);
    res.json({
      latitude: lat,
      longitude: lon,
      weather,
    });
  } catch (error) {
    next(error);
  }
}

router.get('/weather', getWeather);

export default router;
