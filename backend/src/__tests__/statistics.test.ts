import { describe, it, expect, vi } from 'vitest';
import { getPortalUserOverviewStatistics, listEligibleHomeowners } from '../services/statistics.ts';
import { memorySources, InMemoryHomeownerSource, InMemoryPortalUserSource } from '../services/memory-source.ts';
import { DataIntegrityError, DataSourceError, InvalidFilterError } from '../shared/errors.ts';
import type { StatisticsSources } from '../services/dal.ts';
import type { FetchContext, Homeowner, PortalUser } from '../types.ts';

const homeowners: Homeowner[] = [
  { id: 1, firstName: 'Ada', lastName: 'Lane', inactive: null },
  { id: 2, firstName: 'Ben', lastName: 'Moss', inactive: true },
  { id: 3, firstName: 'Cara', lastName: 'North', inactive: false },
  { id: 4, firstName: 'Dev', lastName: 'Oakes', inactive: false },
];

const portalUsers: PortalUser[] = [
  { id: 101, homeownerId: 1, active: true },
  { id: 102, homeownerId: 3, active: false },
  { id: 103, homeownerId: 2, active: true },
];

function spySources(h: Homeowner[] = homeowners, p: PortalUser[] = portalUsers) {
  const fetchHomeowners = vi.fn(async (_ctx: FetchContext) => h);
  const fetchPortalUsers = vi.fn(async (_ctx: FetchContext) => p);
  const sources: StatisticsSources = {
    homeowners: { fetchHomeowners },
    portalUsers: { fetchPortalUsers },
  };
  return { sources, fetchHomeowners, fetchPortalUsers };
}

describe('getPortalUserOverviewStatistics', () => {
  it('computes statistics over the eligible set', async () => {
    const { sources } = spySources();
    const result = await getPortalUserOverviewStatistics(
      { homeownerIds: [1, 2, 3, 4, 99], ratios: ['portalAdoption', 'unregistered'] },
      sources,
    );
    expect(result).toEqual({
      total: 3,
      withPortal: 1,
      withoutPortal: 1,
      inactivePortal: 1,
      ratios: { portalAdoption: 0.3333, unregistered: 0.3333 },
    });
  });

  it('matches the two-homeowner scenario', async () => {
    const sources = memorySources(
      [{ id: 1, firstName: 'A', lastName: '', inactive: null }, { id: 2, firstName: 'B', lastName: '', inactive: null }],
      [{ id: 9, homeownerId: 1, active: true }],
    );
    const result = await getPortalUserOverviewStatistics({ homeownerIds: [1, 2] }, sources);
    expect(result).toMatchObject({ total: 2, withPortal: 1, withoutPortal: 1 });
  });

  it('returns zeros for an empty filter list without fetching', async () => {
    const { sources, fetchHomeowners, fetchPortalUsers } = spySources();
    const result = await getPortalUserOverviewStatistics({ homeownerIds: [] }, sources);
    expect(result).toEqual({ total: 0, withPortal: 0, withoutPortal: 0, inactivePortal: 0, ratios: {} });
    expect(fetchHomeowners).not.toHaveBeenCalled();
    expect(fetchPortalUsers).not.toHaveBeenCalled();
  });

  it.each<{ label: string; criteria: unknown }>([
    { label: 'null criteria', criteria: null },
    { label: 'missing homeownerIds', criteria: {} },
    { label: 'non-array homeownerIds', criteria: { homeownerIds: '1,2' } },
    { label: 'non-positive id', criteria: { homeownerIds: [0] } },
    { label: 'fractional id', criteria: { homeownerIds: [1.5] } },
    { label: 'id beyond the integer column', criteria: { homeownerIds: [2_147_483_648] } },
    { label: 'unknown ratio', criteria: { homeownerIds: [1], ratios: ['churn'] } },
  ])('rejects $label before any fetch', async ({ criteria }) => {
    const { sources, fetchHomeowners, fetchPortalUsers } = spySources();
    await expect(getPortalUserOverviewStatistics(criteria, sources)).rejects.toBeInstanceOf(InvalidFilterError);
    expect(fetchHomeowners).not.toHaveBeenCalled();
    expect(fetchPortalUsers).not.toHaveBeenCalled();
  });

  it('reports which field is malformed', async () => {
    const { sources } = spySources();
    const err = await getPortalUserOverviewStatistics({ homeownerIds: 'x' }, sources).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidFilterError);
    expect(err).toMatchObject({
      code: 'INVALID_FILTER',
      status: 400,
      details: ['homeownerIds: homeownerIds must be an array'],
    });
  });

  it('surfaces a homeowner source failure unchanged as DataSourceError', async () => {
    const { sources, fetchHomeowners } = spySources();
    fetchHomeowners.mockRejectedValueOnce(new Error('timeout'));
    const err = await getPortalUserOverviewStatistics({ homeownerIds: [1] }, sources).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DataSourceError);
    expect(err).toMatchObject({ source: 'homeowner', message: 'homeowner source unavailable: timeout' });
    expect(fetchHomeowners).toHaveBeenCalledTimes(1);
  });

  it('surfaces a portal user source failure as DataSourceError', async () => {
    const { sources, fetchPortalUsers } = spySources();
    fetchPortalUsers.mockRejectedValueOnce(new Error('pool exhausted'));
    await expect(getPortalUserOverviewStatistics({ homeownerIds: [1] }, sources))
      .rejects.toMatchObject({ source: 'portal_user', code: 'DATA_SOURCE_UNAVAILABLE' });
  });

  it('rejects duplicate homeowner ids in the snapshot', async () => {
    const { sources } = spySources([...homeowners, { id: 3, firstName: 'Copy', lastName: 'North', inactive: false }]);
    await expect(getPortalUserOverviewStatistics({ homeownerIds: [3] }, sources))
      .rejects.toBeInstanceOf(DataIntegrityError);
  });

  it('passes tenant and abort signal to both sources', async () => {
    const { sources, fetchHomeowners, fetchPortalUsers } = spySources();
    const controller = new AbortController();
    await getPortalUserOverviewStatistics({ homeownerIds: [1], tenantId: 'acme' }, sources, { signal: controller.signal });
    expect(fetchHomeowners).toHaveBeenCalledWith({ tenantId: 'acme', signal: controller.signal });
    expect(fetchPortalUsers).toHaveBeenCalledWith({ tenantId: 'acme', signal: controller.signal });
  });

  it('uses the default tenant when none is given', async () => {
    const { sources, fetchHomeowners } = spySources();
    await getPortalUserOverviewStatistics({ homeownerIds: [1] }, sources, { defaultTenant: 'north' });
    expect(fetchHomeowners).toHaveBeenCalledWith({ tenantId: 'north', signal: undefined });
  });

  it('fails with DataSourceError once the caller has aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));
    await expect(getPortalUserOverviewStatistics({ homeownerIds: [1] }, memorySources(homeowners, portalUsers), {
      signal: controller.signal,
    })).rejects.toBeInstanceOf(DataSourceError);
  });

  it('keeps tenants apart', async () => {
    const sources: StatisticsSources = {
      homeowners: new InMemoryHomeownerSource({
        east: [{ id: 1, firstName: 'E', lastName: '', inactive: null }],
        west: [{ id: 1, firstName: 'W', lastName: '', inactive: true }],
      }),
      portalUsers: new InMemoryPortalUserSource({ east: [{ id: 5, homeownerId: 1, active: true }] }),
    };
    const [east, west] = await Promise.all([
      getPortalUserOverviewStatistics({ homeownerIds: [1], tenantId: 'east' }, sources),
      getPortalUserOverviewStatistics({ homeownerIds: [1], tenantId: 'west' }, sources),
    ]);
    expect(east).toMatchObject({ total: 1, withPortal: 1 });
    expect(west).toMatchObject({ total: 0, withPortal: 0 });
  });

  it.each(['constructor', 'toString', '__proto__'])('treats tenant %s as unknown', async (tenantId) => {
    const result = await getPortalUserOverviewStatistics(
      { homeownerIds: [1], tenantId },
      memorySources(homeowners, portalUsers),
    );
    expect(result).toEqual({ total: 0, withPortal: 0, withoutPortal: 0, inactivePortal: 0, ratios: {} });
  });
});

describe('listEligibleHomeowners', () => {
  it('returns the sorted projection', async () => {
    const { sources } = spySources();
    const rows = await listEligibleHomeowners(
      { homeownerIds: [4, 3, 2, 1], sort: { field: 'firstName' } },
      sources,
    );
    expect(rows.map(r => r.fullName)).toEqual(['Ada Lane', 'Cara North', 'Dev Oakes']);
  });

  it('rejects a malformed sort', async () => {
    const { sources, fetchHomeowners } = spySources();
    await expect(listEligibleHomeowners({ homeownerIds: [1], sort: { field: 'email' } }, sources))
      .rejects.toBeInstanceOf(InvalidFilterError);
    expect(fetchHomeowners).not.toHaveBeenCalled();
  });
});
