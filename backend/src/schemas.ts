// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for criteria, requests and fixtures
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { RATIO_METRICS } from './types.ts';

// ── Shared ──

// Matches the integer id columns
export const HomeownerIdSchema = z.number().int().positive().max(2_147_483_647);
export const TenantIdSchema = z.string().regex(/^[a-zA-Z0-9_-]{1,64}$/, 'Invalid tenant ID');
export const RatioMetricEnum = z.enum(RATIO_METRICS);

const csv = (s: string): string[] => s.split(',').map(p => p.trim()).filter(Boolean);

// ── Filter criteria (getPortalUserOverviewStatistics) ──

export const FilterCriteriaSchema = z.object({
  homeownerIds: z.array(HomeownerIdSchema, {
    required_error: 'homeownerIds is required',
    invalid_type_error: 'homeownerIds must be an array',
  }).max(50_000),
  tenantId: TenantIdSchema.optional(),
  ratios: z.array(RatioMetricEnum).max(RATIO_METRICS.length).optional(),
});

export type FilterCriteriaInput = z.infer<typeof FilterCriteriaSchema>;

// ── GET /api/portal-users/statistics ──

export const StatisticsQuerySchema = z.object({
  ids: z.string().max(500_000).regex(/^[\d,\s]*$/, 'ids must be a comma-separated list of integers'),
  tenantId: z.string().max(64).optional(),
  ratios: z.string().max(200).optional(),
}).transform(q => ({
  homeownerIds: csv(q.ids).map(Number),
  tenantId: q.tenantId,
  ratios: q.ratios === undefined ? undefined : csv(q.ratios),
}));

// ── POST /api/homeowners/eligible ──

export const EligibleSortSchema = z.object({
  field: z.enum(['id', 'firstName', 'lastName']),
  direction: z.enum(['asc', 'desc']).default('asc'),
});

export const EligibleRequestSchema = FilterCriteriaSchema.pick({
  homeownerIds: true,
  tenantId: true,
}).extend({
  sort: EligibleSortSchema.optional(),
});

export type EligibleRequestInput = z.infer<typeof EligibleRequestSchema>;

// ── Fixture file (ENABLE_DB=false) ──

const FixtureHomeownerSchema = z.object({
  id: HomeownerIdSchema,
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  inactive: z.boolean().nullable().default(null),
});

const FixturePortalUserSchema = z.object({
  id: z.number().int().positive().max(2_147_483_647),
  homeownerId: HomeownerIdSchema,
  active: z.boolean(),
});

export const FixtureFileSchema = z.object({
  tenants: z.record(TenantIdSchema, z.object({
    homeowners: z.array(FixtureHomeownerSchema).default([]),
    portalUsers: z.array(FixturePortalUserSchema).default([]),
  })),
});

export type FixtureFile = z.infer<typeof FixtureFileSchema>;

/** Flatten zod issues into "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}
