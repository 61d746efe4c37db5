/**
 * server.ts — Process entry point
 *
 *   ENABLE_DB=true   → PostgreSQL via Drizzle ORM
 *   ENABLE_DB=false  → in-memory snapshot from FIXTURE_PATH
 */
import 'dotenv/config';
import { env } from './config/env.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { createSources } from './services/dal.ts';
import { createApp } from './app.ts';
import type { Server } from 'http';

const BOOT_TIME = Date.now();
let server: Server | null = null;

async function pingDatabase(): Promise<number> {
  const { pingDb } = await import('./config/database.ts');
  return pingDb();
}

async function start(): Promise<void> {
  await initSentry();

  if (env.ENABLE_DB) {
    const latency = await pingDatabase();
    logger.info({ latencyMs: latency }, 'PostgreSQL connected');
  } else {
    logger.info({ fixture: env.FIXTURE_PATH }, 'Database disabled (ENABLE_DB=false)');
  }

  const sources = await createSources();
  const app = createApp({ sources, pingDb: pingDatabase });

  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });
}

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10_000).unref();

  if (server) {
    const s = server;
    await new Promise<void>(resolve => s.close(() => resolve()));
    logger.info('HTTP server closed');
  }

  try {
    await flushSentry(2000);
    if (env.ENABLE_DB) {
      const { closeDb } = await import('./config/database.ts');
      await closeDb();
    }
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  captureException(err);
  process.exit(1);
});
