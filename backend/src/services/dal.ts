/**
 * services/dal.ts — Data Access Layer
 *
 * The two collaborators the statistics core reads from. Each exposes a single
 * async fetch per collection; pooling and retry belong to the implementation.
 *
 * Feature-flagged: ENABLE_DB=true reads PostgreSQL through Drizzle,
 * false serves an in-memory snapshot loaded from the fixture file.
 */
import { eq } from 'drizzle-orm';
import { env } from '../config/env.ts';
import { getDb, type Database } from '../config/database.ts';
import { homeowners, portalUsers } from '../db/schema.ts';
import { loadFixtureSources } from './memory-source.ts';
import type { Homeowner, PortalUser, FetchContext } from '../types.ts';

export interface HomeownerSource {
  fetchHomeowners(ctx: FetchContext): Promise<readonly Homeowner[]>;
}

export interface PortalUserSource {
  fetchPortalUsers(ctx: FetchContext): Promise<readonly PortalUser[]>;
}

export interface StatisticsSources {
  homeowners: HomeownerSource;
  portalUsers: PortalUserSource;
}

// ══════════════════════════════════════════════════════
// POSTGRES
// ══════════════════════════════════════════════════════

export class DbHomeownerSource implements HomeownerSource {
  constructor(private readonly db: Database) {}

  async fetchHomeowners({ tenantId, signal }: FetchContext): Promise<Homeowner[]> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({
        id: homeowners.id,
        firstName: homeowners.firstName,
        lastName: homeowners.lastName,
        inactive: homeowners.inactive,
      })
      .from(homeowners)
      .where(eq(homeowners.tenantId, tenantId));
    signal?.throwIfAborted();
    return rows;
  }
}

export class DbPortalUserSource implements PortalUserSource {
  constructor(private readonly db: Database) {}

  async fetchPortalUsers({ tenantId, signal }: FetchContext): Promise<PortalUser[]> {
    signal?.throwIfAborted();
    const rows = await this.db
      .select({
        id: portalUsers.id,
        homeownerId: portalUsers.homeownerId,
        active: portalUsers.active,
      })
      .from(portalUsers)
      .where(eq(portalUsers.tenantId, tenantId));
    signal?.throwIfAborted();
    return rows;
  }
}

/**
 * Resolve the sources for the running process.
 */
export async function createSources(): Promise<StatisticsSources> {
  if (!env.ENABLE_DB) return loadFixtureSources(env.FIXTURE_PATH);

  const db = getDb();
  return {
    homeowners: new DbHomeownerSource(db),
    portalUsers: new DbPortalUserSource(db),
  };
}
