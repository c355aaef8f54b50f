import { sql } from "drizzle-orm";
import { pgTable, text, uniqueIndex, uuid } from "drizzle-orm/pg-core";
import { withTimestamps } from "./_common";
import { tenantStates, tenantTypes } from "./enums";

/** Well-known tenant seeded by every bootstrap run. */
export const DEFAULT_TENANT_ID = "00000000-0000-0000-0000-000000000000";

/**
 * tenants
 *
 * Isolation boundary for every other entity. Child rows cascade away with
 * their tenant.
 */
export const tenants = pgTable(
  "tenants",
  {
    tenantId: uuid("tenant_id").primaryKey().defaultRandom(),
    tenantName: text("tenant_name").notNull(),
    tenantType: text("tenant_type", { enum: tenantTypes }).notNull(),
    tenantState: text("tenant_state", { enum: tenantStates }).default("ACTIVE").notNull(),

    /** Optional vanity domain; unique across tenants when present. */
    primaryDomain: text("primary_domain"),

    ...withTimestamps(),
  },
  (table) => ({
    tenantsPrimaryDomainUnique: uniqueIndex("ux_tenants_primary_domain")
      .on(table.primaryDomain)
      .where(sql`primary_domain IS NOT NULL`),
  }),
);

export type Tenant = typeof tenants.$inferSelect;
export type NewTenant = typeof tenants.$inferInsert;
