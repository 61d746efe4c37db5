/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness check (database when enabled)
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';

interface Check {
  status: 'ok' | 'error' | 'disabled';
  latencyMs?: number;
  error?: string;
}

export function createHealthRouter(ping: () => Promise<number>): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, Check> = {};

    if (env.ENABLE_DB) {
      try {
        checks.database = { status: 'ok', latencyMs: await ping() };
      } catch (err) {
        checks.database = { status: 'error', error: err instanceof Error ? err.message : String(err) };
      }
    } else {
      checks.database = { status: 'disabled' };
    }

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      checks,
      config: { nodeEnv: env.NODE_ENV, enableDb: env.ENABLE_DB },
    });
  });

  return router;
}
