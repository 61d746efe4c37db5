/**
 * app.ts — Express application factory
 *
 * Kept apart from server.ts so tests can mount the app on an ephemeral port
 * with in-memory data sources.
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import { attachSentryErrorHandler, captureException } from './config/sentry.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { rateLimiter } from './shared/rate-limit.ts';
import { isAppError, InvalidFilterError } from './shared/errors.ts';
import { createStatisticsRouter } from './routes/statistics.ts';
import { createHealthRouter } from './routes/health.ts';
import type { StatisticsSources } from './services/dal.ts';
import type { ApiResponse } from './types.ts';

export interface AppDeps {
  sources: StatisticsSources;
  pingDb?: () => Promise<number>;
  rateLimit?: { max: number; windowMs: number };
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.set('trust proxy', 1);

  const origins = env.ALLOWED_ORIGINS.split(',').map(s => s.trim());
  app.use(cors({ origin: origins.includes('*') ? true : origins, credentials: true }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '1mb' }));

  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  const limit = deps.rateLimit ?? { max: env.RATE_LIMIT_MAX, windowMs: env.RATE_LIMIT_WINDOW_MS };
  app.use(env.API_BASE, rateLimiter(limit));

  // ─── API Routes ───

  app.get(`${env.API_BASE}/metrics`, metricsEndpoint);
  app.use(`${env.API_BASE}/health`, createHealthRouter(deps.pingDb ?? (() => Promise.resolve(0))));
  app.use(env.API_BASE, createStatisticsRouter(deps.sources));

  app.use((req: Request, res: Response) => {
    const body: ApiResponse = { success: false, error: `Not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' };
    res.status(404).json(body);
  });

  // ─── Error handling: Sentry first, then structured response ───

  attachSentryErrorHandler(app);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? randomUUID().slice(0, 8);
    const log = req.log ?? logger;

    if (isAppError(err)) {
      if (err.status >= 500) {
        log.error({ err, reqId: requestId }, `${err.code} [${requestId}]`);
        captureException(err, { requestId, url: req.originalUrl });
      }
      const body: ApiResponse = {
        success: false,
        error: err.message,
        code: err.code,
        details: err instanceof InvalidFilterError && err.details.length ? err.details : undefined,
        requestId,
      };
      res.status(err.status).json(body);
      return;
    }

    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      // body-parser failures (malformed JSON, payload too large)
      const body: ApiResponse = { success: false, error: 'Malformed request', code: 'BAD_REQUEST', requestId };
      res.status(status).json(body);
      return;
    }

    log.error({ err, reqId: requestId, method: req.method, url: req.originalUrl }, `Unhandled error [${requestId}]`);
    captureException(err, { requestId, url: req.originalUrl });
    const body: ApiResponse = {
      success: false,
      error: env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
      code: 'INTERNAL',
      requestId,
    };
    res.status(500).json(body);
  });

  return app;
}
