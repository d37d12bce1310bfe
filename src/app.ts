import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { TelemetryAnalyticsService } from './analytics';
import { createErrorHandler, notFound } from './middleware/errors';
import { createRequestLogger } from './middleware/logging';
import { createAnalyticsRouter } from './routes';
import type { ServiceMetrics } from './services/metrics';
import type { SampleCache } from './services/sample-cache';
import type { ServiceLogger } from './utils/logger';

export interface AppDependencies {
  service: TelemetryAnalyticsService;
  logger: ServiceLogger;
  metrics?: ServiceMetrics;
  cache?: SampleCache;
}

export function createApp({ service, logger, metrics, cache }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(createRequestLogger(logger));

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send('Telemetry Analytics Service - Running');
  });

  // Health check endpoint
  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const redisOk = cache ? await cache.ping() : false;

      res.json({
        status: redisOk ? 'healthy' : 'degraded',
        time: Math.floor(Date.now() / 1000),
        redis: redisOk ? 'connected' : 'disconnected',
      });
    } catch (error) {
      next(error);
    }
  });

  // Prometheus scrape endpoint
  app.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
    if (!metrics) {
      return notFound(req, res);
    }

    try {
      const body = await metrics.exposition();
      res.set('Content-Type', metrics.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  // API routes
  app.use('/api', createAnalyticsRouter(service, metrics));

  app.use(notFound);
  app.use(createErrorHandler(logger));

  return app;
}
