/**
 * aggregator.ts — Portal account statistics
 *
 * Left-joins the eligible homeowners against portal users and reduces the
 * joined rows into a StatisticsResult. Pure: the same snapshot always yields
 * the same result.
 *
 * Categories are disjoint:
 *   withPortal     — at least one active portal account
 *   inactivePortal — portal accounts exist, none active
 *   withoutPortal  — no portal account record at all
 */
import { safeDiv } from './helpers.ts';
import type {
  EligibleHomeowner, PortalUser, PortalAccountState,
  StatisticsResult, StatisticsConfig, RatioMetric,
} from '../types.ts';

export interface JoinedHomeowner {
  homeowner: EligibleHomeowner;
  portalUsers: readonly PortalUser[];
  portalState: PortalAccountState;
}

/** Index portal users by the homeowner they reference. */
export function indexPortalUsers(portalUsers: Iterable<PortalUser>): Map<number, PortalUser[]> {
  const byHomeowner = new Map<number, PortalUser[]>();
  for (const pu of portalUsers) {
    const bucket = byHomeowner.get(pu.homeownerId);
    if (bucket) bucket.push(pu);
    else byHomeowner.set(pu.homeownerId, [pu]);
  }
  return byHomeowner;
}

export function portalStateOf(accounts: readonly PortalUser[]): PortalAccountState {
  if (accounts.length === 0) return 'none';
  return accounts.some(a => a.active) ? 'active' : 'inactive';
}

/**
 * Left join: one row per eligible homeowner; a missing portal record is
 * state 'none', never an error.
 */
export function* leftJoinPortalUsers(
  eligible: Iterable<EligibleHomeowner>,
  portalUsers: Iterable<PortalUser>,
): Generator<JoinedHomeowner> {
  const index = indexPortalUsers(portalUsers);
  for (const homeowner of eligible) {
    const accounts = index.get(homeowner.id) ?? [];
    yield { homeowner, portalUsers: accounts, portalState: portalStateOf(accounts) };
  }
}

export class PortalStatsAgg {
  total = 0;
  withPortal = 0;
  withoutPortal = 0;
  inactivePortal = 0;

  add(row: JoinedHomeowner): void {
    this.total++;
    if (row.portalState === 'active') this.withPortal++;
    else if (row.portalState === 'inactive') this.inactivePortal++;
    else this.withoutPortal++;
  }

  ratio(metric: RatioMetric): number {
    const num = metric === 'portalAdoption' ? this.withPortal
      : metric === 'unregistered' ? this.withoutPortal
      : this.inactivePortal;
    return safeDiv(num, this.total, 4);
  }

  result(config: StatisticsConfig = {}): StatisticsResult {
    const ratios: Partial<Record<RatioMetric, number>> = {};
    for (const metric of config.ratios ?? []) ratios[metric] = this.ratio(metric);
    return {
      total: this.total,
      withPortal: this.withPortal,
      withoutPortal: this.withoutPortal,
      inactivePortal: this.inactivePortal,
      ratios,
    };
  }
}

/**
 * Reduce the eligible set into a StatisticsResult.
 * An empty eligible set yields all-zero counts.
 */
export function aggregatePortalStatistics(
  eligible: Iterable<EligibleHomeowner>,
  portalUsers: Iterable<PortalUser>,
  config: StatisticsConfig = {},
): StatisticsResult {
  const agg = new PortalStatsAgg();
  for (const row of leftJoinPortalUsers(eligible, portalUsers)) agg.add(row);
  return agg.result(config);
}

export function emptyStatistics(config: StatisticsConfig = {}): StatisticsResult {
  return new PortalStatsAgg().result(config);
}
