import express from 'express';
import type { Request, Response, Router } from 'express';
import { healthCheckController } from '../controllers/health.controller';
import { requestIdOf } from '../lib/requestContext';
import type { CacheStore } from '../types';

export function healthRoutes(cacheStore: CacheStore): Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    const result = healthCheckController(cacheStore, requestIdOf(res));
    res.status(result.statusCode).json(result.body);
  });

  return router;
}
