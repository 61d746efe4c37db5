/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const flag = (def: 'true' | 'false') =>
  z.enum(['true', 'false', '1', '0']).default(def).transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  API_BASE: z.string().startsWith('/').default('/api'),
  ALLOWED_ORIGINS: z.string().default('*'),

  // ── PostgreSQL ──
  DATABASE_URL: z.string().url().startsWith('postgres').describe('PostgreSQL connection string'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_SSL: flag('false'),

  // ── Data ──
  DEFAULT_TENANT: z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/).default('default'),
  FIXTURE_PATH: z.string().default('backend/data/fixtures.json'),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),

  // ── Feature flags ──
  ENABLE_DB: flag('false'),         // false = in-memory fixtures
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Throws with one line per issue.
 * DATABASE_URL may be omitted while the database is disabled.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const raw = { ...source };
  if (!raw.DATABASE_URL && raw.ENABLE_DB !== 'true' && raw.ENABLE_DB !== '1') {
    raw.DATABASE_URL = 'postgres://localhost:5432/portal_stats_dev';
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const lines = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Environment validation failed:\n   ${lines.join('\n   ')}`);
  }
  return result.data;
}

function loadEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

export const env = loadEnv();
