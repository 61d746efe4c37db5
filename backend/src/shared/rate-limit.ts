/**
 * shared/rate-limit.ts — Fixed-window per-IP limiter for GET requests (in-memory)
 *
 * Expired windows are swept at most once per window, so the table only holds
 * clients seen within the last window.
 */
import type { Request, Response, NextFunction } from 'express';
import type { ApiResponse } from '../types.ts';

export interface RateLimitOptions {
  max: number;
  windowMs: number;
  now?: () => number;
}

export interface RateLimiter {
  (req: Request, res: Response, next: NextFunction): void;
  /** Number of clients currently tracked. */
  tracked(): number;
}

export function rateLimiter({ max, windowMs, now = Date.now }: RateLimitOptions): RateLimiter {
  const hits = new Map<string, { n: number; resetAt: number }>();
  let nextSweep = 0;

  function sweep(t: number): void {
    if (t < nextSweep) return;
    for (const [ip, entry] of hits) {
      if (entry.resetAt <= t) hits.delete(ip);
    }
    nextSweep = t + windowMs;
  }

  function limit(req: Request, res: Response, next: NextFunction): void {
    if (req.method !== 'GET') return next();
    const t = now();
    sweep(t);

    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    let entry = hits.get(ip);
    if (!entry || entry.resetAt <= t) {
      entry = { n: 0, resetAt: t + windowMs };
      hits.set(ip, entry);
    }
    entry.n++;
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - entry.n)));
    if (entry.n > max) {
      const body: ApiResponse = { success: false, error: 'Rate limited', code: 'RATE_LIMITED' };
      res.status(429).json(body);
      return;
    }
    next();
  }

  return Object.assign(limit, { tracked: () => hits.size });
}
