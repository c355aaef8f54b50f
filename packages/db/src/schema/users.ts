import { sql } from "drizzle-orm";
import { index, pgTable, text, uniqueIndex, uuid } from "drizzle-orm/pg-core";
import { withTimestamps } from "./_common";
import { authProviders, userStates } from "./enums";
import { tenants } from "./tenants";

/**
 * users
 *
 * IAM identity. Belongs to exactly one tenant; email is globally unique and
 * an external identity (provider + subject) maps to at most one user.
 */
export const users = pgTable(
  "users",
  {
    userId: uuid("user_id").primaryKey().defaultRandom(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" }),
    email: text("email").notNull().unique("users_email_key"),
    name: text("name"),
    authProvider: text("auth_provider", { enum: authProviders }).default("GOOGLE").notNull(),

    /** Subject claim at the identity provider; null for not-yet-linked users. */
    externalSubject: text("external_subject"),

    state: text("state", { enum: userStates }).default("ACTIVE").notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    usersTenantIdx: index("idx_users_tenant_id").on(table.tenantId),
    usersEmailIdx: index("idx_users_email").on(table.email),
    usersAuthProviderIdx: index("idx_users_auth_provider").on(table.authProvider),
    usersProviderSubjectUnique: uniqueIndex("ux_users_provider_subject")
      .on(table.authProvider, table.externalSubject)
      .where(sql`external_subject IS NOT NULL`),
  }),
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
