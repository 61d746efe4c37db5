/**
 * config/database.ts — PostgreSQL connection via Drizzle ORM
 *
 * Uses node-postgres Pool for connection management.
 * Provides typed Drizzle client for the data sources.
 */
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';
import * as schema from '../db/schema.ts';

const { Pool } = pg;
const log = childLogger({ module: 'db' });

let pool: pg.Pool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;

function createPool(): pg.Pool {
  const p = new Pool({
    connectionString: env.DATABASE_URL,
    min: env.DB_POOL_MIN,
    max: env.DB_POOL_MAX,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  p.on('error', (err) => {
    log.error({ err }, 'Unexpected pool error');
  });
  return p;
}

/**
 * Get or create the database connection pool and Drizzle client.
 * Safe to call multiple times — returns cached instance.
 */
export function getDb(): NodePgDatabase<typeof schema> {
  if (db) return db;

  if (!env.ENABLE_DB) {
    throw new Error('Database is disabled (ENABLE_DB=false). Use in-memory fixtures.');
  }

  db = drizzle(getPool(), { schema });
  return db;
}

export function getPool(): pg.Pool {
  if (!pool) pool = createPool();
  return pool;
}

/**
 * Check database connectivity. Returns latency in ms or throws.
 */
export async function pingDb(): Promise<number> {
  const start = Date.now();
  const client = await getPool().connect();
  try {
    await client.query('SELECT 1');
    return Date.now() - start;
  } finally {
    client.release();
  }
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
    log.info('Connection pool closed');
  }
}

export type Database = NodePgDatabase<typeof schema>;
