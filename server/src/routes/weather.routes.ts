import express from 'express';
import type { NextFunction, Request, Response, Router } from 'express';
import { getWeatherController } from '../controllers/weather.controller';
import { requestIdOf } from '../lib/requestContext';
import type { WeatherService } from '../services/weather.service';

const firstString = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
};

export function weatherRoutes(service: WeatherService): Router {
  const router = express.Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    // Abort upstream calls when the client goes away before the response is written.
    const controller = new AbortController();
    const abortOnClose = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on('close', abortOnClose);

    try {
      const result = await getWeatherController(
        service,
        { city: firstString(req.query['city']), requestId: requestIdOf(res) },
        controller.signal
      );
      return res.status(result.statusCode).json(result.body);
    } catch (error) {
      return next(error);
    } finally {
      res.off('close', abortOnClose);
    }
  });

  return router;
}
