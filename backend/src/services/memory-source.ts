/**
 * services/memory-source.ts — In-memory data sources
 *
 * Serves a fixed snapshot per tenant. Used when ENABLE_DB=false and as the
 * substitute collaborator in tests.
 */
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { FixtureFileSchema, formatIssues } from '../schemas.ts';
import { childLogger } from '../shared/logger.ts';
import type { HomeownerSource, PortalUserSource, StatisticsSources } from './dal.ts';
import type { Homeowner, PortalUser, FetchContext } from '../types.ts';

const log = childLogger({ module: 'memory-source' });

type TenantSnapshot<T> = Record<string, readonly T[]>;

// Keyed by own properties only, so ids like "constructor" stay unknown tenants
function byTenant<T>(data: TenantSnapshot<T>): ReadonlyMap<string, readonly T[]> {
  return new Map(Object.entries(data));
}

function snapshotFor<T>(
  data: ReadonlyMap<string, readonly T[]>,
  { tenantId, signal }: FetchContext,
): Promise<readonly T[]> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  return Promise.resolve(data.get(tenantId) ?? []);
}

export class InMemoryHomeownerSource implements HomeownerSource {
  private readonly data: ReadonlyMap<string, readonly Homeowner[]>;

  constructor(data: TenantSnapshot<Homeowner>) {
    this.data = byTenant(data);
  }

  fetchHomeowners(ctx: FetchContext): Promise<readonly Homeowner[]> {
    return snapshotFor(this.data, ctx);
  }
}

export class InMemoryPortalUserSource implements PortalUserSource {
  private readonly data: ReadonlyMap<string, readonly PortalUser[]>;

  constructor(data: TenantSnapshot<PortalUser>) {
    this.data = byTenant(data);
  }

  fetchPortalUsers(ctx: FetchContext): Promise<readonly PortalUser[]> {
    return snapshotFor(this.data, ctx);
  }
}

/** Single-tenant convenience for fixtures. */
export function memorySources(
  homeowners: readonly Homeowner[],
  portalUsers: readonly PortalUser[],
  tenantId = 'default',
): StatisticsSources {
  return {
    homeowners: new InMemoryHomeownerSource({ [tenantId]: homeowners }),
    portalUsers: new InMemoryPortalUserSource({ [tenantId]: portalUsers }),
  };
}

/**
 * Load a tenant-keyed snapshot from a JSON fixture file.
 * Fails fast if the file is missing or does not match the schema.
 */
export async function loadFixtureSources(path: string): Promise<StatisticsSources> {
  const full = resolve(process.cwd(), path);
  const raw: unknown = JSON.parse(await readFile(full, 'utf-8'));
  const parsed = FixtureFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid fixture file ${full}: ${formatIssues(parsed.error).join('; ')}`);
  }

  const tenants = Object.entries(parsed.data.tenants);
  log.info({ path: full, tenants: tenants.length }, 'Fixture snapshot loaded');
  return {
    homeowners: new InMemoryHomeownerSource(Object.fromEntries(tenants.map(([id, snap]) => [id, snap.homeowners]))),
    portalUsers: new InMemoryPortalUserSource(Object.fromEntries(tenants.map(([id, snap]) => [id, snap.portalUsers]))),
  };
}
