import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import config from './config';
import errorHandler from './middlewares/errorHandler';
import requestLogger from './middlewares/requestLogger';
import flightsRoutes from './routes/flights.routes';
import weatherRoutes from './routes/weather.routes';
import healthRoutes from './routes/health.routes';

export function createApp(): Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser clients send no Origin header
        if (!origin || config.cors.allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error('CORS policy violation'), false);
      },
    }),
  );

  app.use(express.json());
  app.use(requestLogger);

  app.use('/api', flightsRoutes);
  app.use('/api', weatherRoutes);
  app.use('/api', healthRoutes);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}

export default createApp;
