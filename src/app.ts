// src/app.ts: express app: security headers, CORS, access logs, routes, error envelope
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from '@/config/app.config';
import { errorMiddleware, notFoundMiddleware } from '@/middleware/error.middleware';
import { createTripsRouter } from '@/routes/trips';
import type { TripService } from '@/services/trip-service';

export function createApp(config: AppConfig, tripService: TripService): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.use('/api', createTripsRouter(tripService));

  app.use(notFoundMiddleware);
  app.use(errorMiddleware);
  return app;
}
