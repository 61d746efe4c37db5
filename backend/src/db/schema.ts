/**
 * db/schema.ts — Drizzle ORM schema definitions
 *
 * Tables read by the statistics service:
 *   homeowners    — person records tied to a managed property
 *   portal_users  — self-service portal accounts, referencing a homeowner
 *
 * Both are tenant-scoped. The service only reads them.
 */
import {
  pgTable, integer, text, varchar, boolean, timestamp, index,
} from 'drizzle-orm/pg-core';

export const homeowners = pgTable('homeowners', {
  id: integer('id').primaryKey(),
  tenantId: varchar('tenant_id', { length: 64 }).notNull(),
  firstName: text('first_name').notNull().default(''),
  lastName: text('last_name').notNull().default(''),
  inactive: boolean('inactive'),                     // nullable: unknown
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  tenantIdx: index('idx_homeowners_tenant').on(table.tenantId),
}));

export const portalUsers = pgTable('portal_users', {
  id: integer('id').primaryKey(),
  tenantId: varchar('tenant_id', { length: 64 }).notNull(),
  homeownerId: integer('homeowner_id').notNull(),    // reference only, no cascade
  active: boolean('active').notNull().default(false),
}, (table) => ({
  tenantIdx: index('idx_portal_users_tenant').on(table.tenantId),
  homeownerIdx: index('idx_portal_users_homeowner').on(table.homeownerId),
}));
