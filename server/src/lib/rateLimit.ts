import type { NextFunction, Request, Response } from 'express';

export type RateLimitOptions = {
  windowMs: number;
  max: number;
};

type Bucket = { count: number; resetAt: number };

/**
 * Fixed-window limiter keyed by client IP. Buckets live in the returned
 * middleware, one map per app instance.
 */
export function createRateLimiter({ windowMs, max }: RateLimitOptions) {
  const buckets = new Map<string, Bucket>();

  function currentBucket(key: string, now: number): Bucket {
    const existing = buckets.get(key);
    if (!existing || existing.resetAt <= now) {
      const bucket = { count: 0, resetAt: now + windowMs };
      buckets.set(key, bucket);
      return bucket;
    }
    return existing;
  }

  return function rateLimiter(req: Request, res: Response, next: NextFunction) {
    const now = Date.now();
    const key = req.ip || 'global';
    const bucket = currentBucket(key, now);
    bucket.count += 1;

    if (bucket.count > max) {
      const retryAfter = Math.max(0, bucket.resetAt - now);
      res.setHeader('Retry-After', String(Math.ceil(retryAfter / 1000)));
      res.status(429).json({ error: 'rate_limited', message: 'Too many requests. Try again later.' });
      return;
    }

    next();
  };
}
