/**
 * services/statistics.ts — Portal user overview statistics
 *
 * validate criteria → fetch both collections concurrently → query engine →
 * aggregator. Stateless per request; every failure propagates to the caller.
 */
import { env } from '../config/env.ts';
import { childLogger } from '../shared/logger.ts';
import { statisticsRequests, sourceFetchDuration, eligibleHomeowners } from '../shared/metrics.ts';
import {
  AppError, DataIntegrityError, DataSourceError, InvalidFilterError,
} from '../shared/errors.ts';
import { FilterCriteriaSchema, EligibleRequestSchema, formatIssues } from '../schemas.ts';
import { buildEligiblePipeline, fetchHomeowners, selectEligibleHomeowners } from './query.ts';
import { aggregatePortalStatistics, emptyStatistics } from './aggregator.ts';
import { distinctCount } from './helpers.ts';
import type { z } from 'zod';
import type { StatisticsSources } from './dal.ts';
import type {
  FetchContext, PortalUser, StatisticsResult, EligibleHomeowner,
} from '../types.ts';

const log = childLogger({ module: 'statistics' });

export interface StatisticsOptions {
  signal?: AbortSignal;
  /** Tenant used when the criteria name none. Defaults to DEFAULT_TENANT. */
  defaultTenant?: string;
}

type SourceLabel = 'homeowner' | 'portal_user';

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidFilterError('Invalid filter criteria', formatIssues(parsed.error));
  }
  return parsed.data;
}

async function timed<T>(source: SourceLabel, fetch: () => Promise<T>): Promise<T> {
  const end = sourceFetchDuration.startTimer({ source });
  try {
    const result = await fetch();
    end({ status: 'ok' });
    return result;
  } catch (err) {
    end({ status: 'error' });
    throw err;
  }
}

async function fetchPortalUsers(sources: StatisticsSources, ctx: FetchContext): Promise<readonly PortalUser[]> {
  try {
    return await sources.portalUsers.fetchPortalUsers(ctx);
  } catch (err) {
    if (err instanceof DataSourceError) throw err;
    throw new DataSourceError('portal_user', err);
  }
}

function outcomeOf(err: unknown): string {
  if (err instanceof InvalidFilterError) return 'invalid_filter';
  if (err instanceof DataSourceError) return 'data_source';
  if (err instanceof DataIntegrityError) return 'data_integrity';
  return 'error';
}

/**
 * GetPortalUserOverviewStatistics(filterCriteria) → StatisticsResult
 *
 * Malformed criteria raise InvalidFilterError before any fetch. An empty
 * filter list yields all-zero counts without touching the sources.
 */
export async function getPortalUserOverviewStatistics(
  criteria: unknown,
  sources: StatisticsSources,
  options: StatisticsOptions = {},
): Promise<StatisticsResult> {
  const t0 = Date.now();
  try {
    const input = parseOrThrow(FilterCriteriaSchema, criteria);
    const config = { ratios: input.ratios };
    const tenantId = input.tenantId ?? options.defaultTenant ?? env.DEFAULT_TENANT;

    let result: StatisticsResult;
    if (input.homeownerIds.length === 0) {
      result = emptyStatistics(config);
    } else {
      const ctx: FetchContext = { tenantId, signal: options.signal };
      const [homeowners, portalUsers] = await Promise.all([
        timed('homeowner', () => fetchHomeowners(sources.homeowners, ctx)),
        timed('portal_user', () => fetchPortalUsers(sources, ctx)),
      ]);
      const eligible = buildEligiblePipeline(homeowners, input.homeownerIds);
      result = aggregatePortalStatistics(eligible, portalUsers, config);
    }

    eligibleHomeowners.observe(result.total);
    statisticsRequests.inc({ outcome: 'ok' });
    log.debug({
      tenantId,
      filterIds: distinctCount(input.homeownerIds),
      total: result.total,
      withPortal: result.withPortal,
      withoutPortal: result.withoutPortal,
      inactivePortal: result.inactivePortal,
      durationMs: Date.now() - t0,
    }, 'Portal user statistics computed');
    return result;
  } catch (err) {
    statisticsRequests.inc({ outcome: outcomeOf(err) });
    const level = err instanceof AppError && err.status < 500 ? 'warn' : 'error';
    log[level]({ err, durationMs: Date.now() - t0 }, 'Portal user statistics failed');
    throw err;
  }
}

/**
 * Eligible projection for a filter list, optionally sorted.
 */
export async function listEligibleHomeowners(
  request: unknown,
  sources: StatisticsSources,
  options: StatisticsOptions = {},
): Promise<EligibleHomeowner[]> {
  const input = parseOrThrow(EligibleRequestSchema, request);
  const ctx: FetchContext = {
    tenantId: input.tenantId ?? options.defaultTenant ?? env.DEFAULT_TENANT,
    signal: options.signal,
  };
  return selectEligibleHomeowners(sources.homeowners, input.homeownerIds, ctx, { sort: input.sort });
}
