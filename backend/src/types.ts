// ═══════════════════════════════════════════════════════
// Portal User Statistics — Core Type Definitions
// Every data shape used across the service.
// ═══════════════════════════════════════════════════════

// ── Source records (read-only snapshots) ──

export interface Homeowner {
  id: number;
  firstName: string;
  lastName: string;
  inactive: boolean | null;   // true = inactive, false = active, null = unknown
}

export interface PortalUser {
  id: number;
  homeownerId: number;        // foreign reference, not ownership
  active: boolean;            // portal account active/registered
}

// ── Query engine ──

export type HomeownerActiveStatus = 'active' | 'unknown';

export interface EligibleHomeowner {
  id: number;
  firstName: string;
  lastName: string;
  fullName: string;
  activeStatus: HomeownerActiveStatus;
}

export type EligibleSortField = 'id' | 'firstName' | 'lastName';
export type SortDirection = 'asc' | 'desc';

export interface EligibleSort {
  field: EligibleSortField;
  direction: SortDirection;
}

// ── Aggregator ──

export const RATIO_METRICS = ['portalAdoption', 'unregistered', 'inactivePortal'] as const;
export type RatioMetric = (typeof RATIO_METRICS)[number];

export type PortalAccountState = 'active' | 'inactive' | 'none';

export interface StatisticsResult {
  total: number;
  withPortal: number;
  withoutPortal: number;
  inactivePortal: number;
  ratios: Partial<Record<RatioMetric, number>>;
}

export interface StatisticsConfig {
  ratios?: readonly RatioMetric[];
}

// ── Exposed operation ──

export interface FilterCriteria {
  homeownerIds: number[];
  tenantId?: string;
  ratios?: RatioMetric[];
}

export interface FetchContext {
  tenantId: string;
  signal?: AbortSignal;
}

// ── API response ──

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: string[];
  requestId?: string;
}
