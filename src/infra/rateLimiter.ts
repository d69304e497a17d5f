import type { Request, Response, NextFunction } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  /** Bucket key; defaults to the client IP */
  keyFor?: (req: Request, res: Response) => string;
};

type RateLimitState = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter. Counts per signed-in user when mounted after the auth
 * middleware, otherwise per IP.
 */
export function createRateLimiter({ windowMs, max, keyFor }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const hits = new Map<string, RateLimitState>();
  const bucketKey =
    keyFor ??
    ((req: Request, res: Response) => {
      const user: unknown = res.locals.user;
      return typeof user === 'string' ? `user:${user}` : `ip:${req.ip ?? 'unknown'}`;
    });

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = bucketKey(req, res);
    const existing = hits.get(key);

    if (!existing || now >= existing.resetAt) {
      hits.set(key, { count: 1, resetAt: now + windowMs });
    } else {
      existing.count += 1;
      if (existing.count > max) {
        const retryAfterSeconds = Math.ceil((existing.resetAt - now) / 1000);
        res.setHeader('Retry-After', String(retryAfterSeconds));
        res.setHeader('X-RateLimit-Limit', String(max));
        res.setHeader('X-RateLimit-Remaining', '0');
        return res.status(429).json({
          error: 'RATE_LIMITED',
          message: 'Too many requests. Please retry later.',
        });
      }
    }

    const current = hits.get(key);
    if (current) {
      res.setHeader('X-RateLimit-Limit', String(max));
      res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - current.count)));
    }

    next();
  };
}
