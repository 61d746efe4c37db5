/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent unless LOG_LEVEL is set
 *
 * Child loggers carry request ID correlation; the Express middleware below
 * logs every API request with its duration and status.
 */
import pino, { type Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: Logger;
    }
  }
}

function defaultLevel(): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: defaultLevel(),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'portal-user-stats',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    censor: '[REDACTED]',
  },
});

/**
 * Express middleware: logs every API request with duration and status.
 * Attaches a child logger to req.log for per-request context.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const header = req.headers['x-request-id'];
    const reqId = (typeof header === 'string' && header) || randomUUID().slice(0, 8);

    req.id = reqId;
    const log = logger.child({ reqId });
    req.log = log;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      log[level]({
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      }, `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'statistics', tenantId });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
