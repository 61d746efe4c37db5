/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops and @sentry/node is never loaded.
 */
import type { Express } from 'express';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

type SentryModule = typeof import('@sentry/node');

const log = childLogger({ module: 'sentry' });
let Sentry: SentryModule | null = null;

/**
 * Initialize Sentry. Call once at server startup.
 */
export async function initSentry(): Promise<void> {
  if (!env.SENTRY_DSN) {
    log.info('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  const mod = await import('@sentry/node');
  mod.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version || 'unknown',
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },
  });

  Sentry = mod;
  log.info('Sentry initialized');
}

/**
 * Capture an exception manually.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  if (!Sentry) return;
  Sentry.captureException(err, context ? { extra: context } : undefined);
}

/**
 * Register Sentry's Express error handler. Call after all routes,
 * before the app's own error handler.
 */
export function attachSentryErrorHandler(app: Express): void {
  if (Sentry) Sentry.setupExpressErrorHandler(app);
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!Sentry) return;
  await Sentry.flush(timeout);
}
