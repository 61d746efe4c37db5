/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   portal_stats_http_requests_total            — Counter by method/route/status
 *   portal_stats_http_request_duration_seconds  — Histogram by method/route/status
 *   portal_stats_requests_total                 — Statistics requests by outcome
 *   portal_stats_source_fetch_duration_seconds  — Data source fetch latency
 *   portal_stats_eligible_homeowners            — Eligible set size per request
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'portal_stats_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'portal_stats_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'portal_stats_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const activeConnections = new Gauge({
  name: 'portal_stats_active_connections',
  help: 'Current active HTTP connections',
  registers: [registry],
});

// ── Statistics Metrics ──

export const statisticsRequests = new Counter({
  name: 'portal_stats_requests_total',
  help: 'Portal user statistics requests by outcome',
  labelNames: ['outcome'] as const, // ok, invalid_filter, data_source, data_integrity, error
  registers: [registry],
});

export const sourceFetchDuration = new Histogram({
  name: 'portal_stats_source_fetch_duration_seconds',
  help: 'Data source fetch duration in seconds',
  labelNames: ['source', 'status'] as const, // homeowner | portal_user × ok | error
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const eligibleHomeowners = new Histogram({
  name: 'portal_stats_eligible_homeowners',
  help: 'Eligible homeowners per statistics request',
  buckets: [0, 10, 100, 1000, 10_000, 50_000],
  registers: [registry],
});

// ── Express Middleware ──

/**
 * Normalize route for metric labels: prefer the matched route pattern,
 * fall back to the path without its query string.
 */
function normalizeRoute(req: Request): string {
  const matched: unknown = req.route?.path;
  if (typeof matched === 'string') return `${req.baseUrl}${matched}`;
  return (req.originalUrl || req.url).split('?')[0] ?? '';
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.endsWith('/metrics')) return next();

    activeConnections.inc();
    const end = httpRequestDuration.startTimer();

    res.once('close', () => activeConnections.dec());
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    res.status(500).end(`Error collecting metrics: ${err instanceof Error ? err.message : String(err)}`);
  }
}
