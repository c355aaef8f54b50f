import type { PlanLimits } from "@traceforge/schema";
import {
  boolean,
  index,
  integer,
  json,
  pgTable,
  serial,
  text,
  timestamp,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { withTimestamps } from "./_common";
import { planDurations, subscriptionStatuses, usageMetrics } from "./enums";
import { tenants } from "./tenants";

/**
 * plans
 *
 * Named numeric limits per billing plan. A limit of `-1` is unlimited.
 */
export const plans = pgTable(
  "plans",
  {
    planId: serial("plan_id").primaryKey(),
    name: varchar("name", { length: 100 }).notNull().unique("plans_name_key"),
    description: text("description"),

    /** Decimal string, e.g. `99.00`. */
    price: varchar("price", { length: 20 }).default("0.00").notNull(),

    /** `monthly`, `yearly` or `lifetime`; drives usage reset cadence. */
    duration: varchar("duration", { length: 20, enum: planDurations }).default("monthly").notNull(),

    limits: json("limits").$type<PlanLimits>().notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    plansNameIdx: index("idx_plans_name").on(table.name),
    plansActiveIdx: index("idx_plans_is_active").on(table.isActive),
  }),
);

/**
 * subscriptions
 *
 * Binds one tenant to one plan at a time (`UNIQUE(tenant_id)`). Plans are not
 * cascaded: a plan in use cannot be deleted.
 */
export const subscriptions = pgTable(
  "subscriptions",
  {
    subscriptionId: serial("subscription_id").primaryKey(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" })
      .unique("subscriptions_tenant_id_key"),
    planId: integer("plan_id")
      .notNull()
      .references(() => plans.planId),
    status: varchar("status", { length: 20, enum: subscriptionStatuses })
      .default("ACTIVE")
      .notNull(),
    startDate: timestamp("start_date", { withTimezone: true }).notNull(),
    endDate: timestamp("end_date", { withTimezone: true }),
    autoRenew: boolean("auto_renew").default(true).notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    subscriptionsTenantIdx: index("idx_subscriptions_tenant_id").on(table.tenantId),
    subscriptionsPlanIdx: index("idx_subscriptions_plan_id").on(table.planId),
    subscriptionsStatusIdx: index("idx_subscriptions_status").on(table.status),
  }),
);

/**
 * usage
 *
 * One counter per (subscription, metric) with the limit copied from the plan
 * when the counter is created or the plan changes.
 */
export const usage = pgTable(
  "usage",
  {
    usageId: serial("usage_id").primaryKey(),
    subscriptionId: integer("subscription_id")
      .notNull()
      .references(() => subscriptions.subscriptionId, { onDelete: "cascade" }),
    metric: varchar("metric", { length: 50, enum: usageMetrics }).notNull(),
    used: integer("used").default(0).notNull(),
    limit: integer("limit").notNull(),
    resetDate: timestamp("reset_date", { withTimezone: true }).notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    usageSubscriptionMetricKey: unique("usage_subscription_id_metric_key").on(
      table.subscriptionId,
      table.metric,
    ),
    usageSubscriptionIdx: index("idx_usage_subscription_id").on(table.subscriptionId),
    usageMetricIdx: index("idx_usage_metric").on(table.metric),
    usageResetDateIdx: index("idx_usage_reset_date").on(table.resetDate),
  }),
);

export type Plan = typeof plans.$inferSelect;
export type NewPlan = typeof plans.$inferInsert;
export type Subscription = typeof subscriptions.$inferSelect;
export type NewSubscription = typeof subscriptions.$inferInsert;
export type Usage = typeof usage.$inferSelect;
export type NewUsage = typeof usage.$inferInsert;
