import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { logger } from './logger';

export const REQUEST_ID_HEADER = 'X-Request-ID';

export function requestIdOf(res: Response): string | undefined {
  const value: unknown = res.locals['requestId'];
  return typeof value === 'string' ? value : undefined;
}

export function requestId(req: Request, res: Response, next: NextFunction) {
  const rid = req.get(REQUEST_ID_HEADER) || randomUUID();
  res.locals['requestId'] = rid;
  res.setHeader(REQUEST_ID_HEADER, rid);
  next();
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    logger.info(
      {
        reqId: requestIdOf(res),
        method: req.method,
        url: req.originalUrl ?? req.url,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      },
      'Request completed'
    );
  });

  next();
}
