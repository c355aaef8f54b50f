import type { RequirementDetail } from "@traceforge/schema";
import {
  bigserial,
  index,
  integer,
  json,
  pgTable,
  serial,
  text,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { withTimestamps } from "./_common";
import { generationStatuses } from "./enums";
import { tenants } from "./tenants";

/** Tenant-scoped requirement categories. */
export const requirementLabels = pgTable(
  "requirement_labels",
  {
    labelId: serial("label_id").primaryKey(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" }),
    requirementLabel: varchar("requirement_label", { length: 255 }).notNull(),
    ...withTimestamps("loose"),
  },
  (table) => ({
    requirementLabelsTenantLabelUnique: unique(
      "requirement_labels_tenant_id_requirement_label_key",
    ).on(table.tenantId, table.requirementLabel),
    requirementLabelsTenantIdx: index("idx_requirement_labels_tenant_id").on(table.tenantId),
    requirementLabelsNameIdx: index("idx_requirement_labels_name").on(table.requirementLabel),
  }),
);

/**
 * requirements
 *
 * Versioned history. `requirement_id` is the logical identity shared by all
 * versions; `row_id` identifies one immutable version row.
 *
 * Rules:
 * - (requirement_id, version) is unique
 * - editing means inserting version + 1, never updating content columns
 * - only `testcase_generation_status` moves on an existing row
 */
export const requirements = pgTable(
  "requirements",
  {
    requirementId: uuid("requirement_id").notNull(),
    rowId: bigserial("row_id", { mode: "number" }).primaryKey(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" }),
    labelId: integer("label_id")
      .notNull()
      .references(() => requirementLabels.labelId, { onDelete: "cascade" }),
    title: text("title").notNull(),
    version: integer("version").notNull(),
    rawText: text("raw_text"),
    requirementDetail: json("requirement_detail").$type<RequirementDetail>().notNull(),
    testcaseGenerationStatus: text("testcase_generation_status", {
      enum: generationStatuses,
    }).default("NOT_STARTED"),
    ...withTimestamps("loose"),
    metaInfo: json("meta_info").$type<Record<string, unknown>>(),
  },
  (table) => ({
    requirementsIdVersionUnique: unique("requirements_requirement_id_version_key").on(
      table.requirementId,
      table.version,
    ),
    requirementsRequirementIdx: index("idx_requirements_requirement_id").on(table.requirementId),
    requirementsLabelIdx: index("idx_requirements_label_id").on(table.labelId),
    requirementsTenantIdx: index("idx_requirements_tenant_id").on(table.tenantId),
    requirementsVersionIdx: index("idx_requirements_version").on(
      table.requirementId,
      table.version,
    ),
    requirementsLabelVersionIdx: index("idx_requirements_label_id_version").on(
      table.labelId,
      table.version,
    ),
  }),
);

export type RequirementLabel = typeof requirementLabels.$inferSelect;
export type NewRequirementLabel = typeof requirementLabels.$inferInsert;
export type Requirement = typeof requirements.$inferSelect;
export type NewRequirement = typeof requirements.$inferInsert;
