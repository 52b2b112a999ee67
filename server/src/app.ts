/**
 * Express app setup
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from './lib/logger';
import { createRateLimiter } from './lib/rateLimit';
import { REQUEST_ID_HEADER, requestId, requestIdOf, requestLogger } from './lib/requestContext';
import { weatherRoutes } from './routes/weather.routes';
import { metricsRoutes } from './routes/metrics.routes';
import { healthRoutes } from './routes/health.routes';
import type { AppDependencies } from './container';

export function createApp(deps: AppDependencies) {
  const { config, weatherService, cacheStore } = deps;
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: false, // JSON API only
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(
    cors({
      origin: config.server.corsOrigins,
      credentials: true,
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', REQUEST_ID_HEADER],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  app.use(requestId);
  app.use(requestLogger);
  app.use(createRateLimiter({ windowMs: config.server.rateLimitWindowMs, max: config.server.rateLimitMax }));

  app.use('/api/weather', weatherRoutes(weatherService));
  app.use('/api/metrics', metricsRoutes(weatherService));
  app.use('/api/healthz', healthRoutes(cacheStore));
  app.use('/health', healthRoutes(cacheStore));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'Weather Notifier API',
      version: '1.0.0',
      status: 'running',
      timestamp: new Date().toISOString(),
      endpoints: {
        weather: '/api/weather?city=<name>',
        metrics: '/api/metrics',
        health: '/api/healthz',
      },
    });
  });

  app.use('*', (req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const reqId = requestIdOf(res);

    logger.error({ reqId, err: error, url: req.url, method: req.method }, 'Unhandled error');

    res.status(500).json({
      error: 'Internal Server Error',
      message:
        process.env['NODE_ENV'] === 'development' && error instanceof Error
          ? error.message
          : 'Something went wrong',
      timestamp: new Date().toISOString(),
      ...(reqId && { requestId: reqId }),
    });
  });

  return app;
}
