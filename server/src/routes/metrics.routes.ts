import express from 'express';
import type { Request, Response, Router } from 'express';
import { getMetricsController } from '../controllers/metrics.controller';
import { requestIdOf } from '../lib/requestContext';
import type { WeatherService } from '../services/weather.service';

export function metricsRoutes(service: WeatherService): Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    const result = getMetricsController(service, requestIdOf(res));
    res.status(result.statusCode).json(result.body);
  });

  return router;
}
