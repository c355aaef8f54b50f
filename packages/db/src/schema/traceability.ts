import type { TraceabilityData } from "@traceforge/schema";
import {
  foreignKey,
  index,
  integer,
  json,
  pgTable,
  serial,
  text,
  unique,
  uuid,
} from "drizzle-orm/pg-core";
import { createdAtNullable, withTimestamps } from "./_common";
import { matrixStatuses } from "./enums";
import { requirements } from "./requirements";
import { testcases } from "./testcases";

/**
 * requirement_testcase_map
 *
 * Links one requirement version to one testcase version.
 *
 * `linked_at_version` records the requirement version active when the link
 * was made, so the row is versioned traceability evidence and not only a live
 * foreign key.
 */
export const requirementTestcaseMap = pgTable(
  "requirement_testcase_map",
  {
    id: serial("id").primaryKey(),
    requirementId: uuid("requirement_id").notNull(),
    requirementVersion: integer("requirement_version").notNull(),
    testcaseId: uuid("testcase_id").notNull(),
    testcaseVersion: integer("testcase_version").notNull(),
    linkedAtVersion: integer("linked_at_version").notNull(),
    createdAt: createdAtNullable,
  },
  (table) => ({
    requirementTestcaseMapKey: unique().on(
      table.requirementId,
      table.requirementVersion,
      table.testcaseId,
      table.testcaseVersion,
    ),
    requirementTestcaseMapRequirementFk: foreignKey({
      columns: [table.requirementId, table.requirementVersion],
      foreignColumns: [requirements.requirementId, requirements.version],
    }).onDelete("cascade"),
    requirementTestcaseMapTestcaseFk: foreignKey({
      columns: [table.testcaseId, table.testcaseVersion],
      foreignColumns: [testcases.testcaseId, testcases.version],
      name: "requirement_testcase_map_testcase_id_testcase_version_fkey",
    }).onDelete("cascade"),
    mapRequirementIdx: index("idx_map_requirement_id").on(table.requirementId),
    mapTestcaseIdx: index("idx_map_testcase_id").on(table.testcaseId),
    mapRequirementVersionIdx: index("idx_map_requirement_version").on(
      table.requirementId,
      table.requirementVersion,
    ),
    mapTestcaseVersionIdx: index("idx_map_testcase_version").on(
      table.testcaseId,
      table.testcaseVersion,
    ),
  }),
);

/**
 * traceability_matrix
 *
 * One summary row per (requirement_id, version). `traceability_data` is opaque
 * structured data owned by the generation pipeline.
 */
export const traceabilityMatrix = pgTable(
  "traceability_matrix",
  {
    matrixId: uuid("matrix_id").primaryKey().defaultRandom(),
    requirementId: uuid("requirement_id").notNull(),
    version: integer("version").notNull(),
    status: text("status", { enum: matrixStatuses }).default("NOT_STARTED"),
    traceabilityData: json("traceability_data").$type<TraceabilityData>(),
    ...withTimestamps(),
  },
  (table) => ({
    traceabilityMatrixKey: unique("traceability_matrix_requirement_id_version_key").on(
      table.requirementId,
      table.version,
    ),
    traceabilityMatrixRequirementIdx: index("idx_traceability_matrix_requirement_id").on(
      table.requirementId,
    ),
    traceabilityMatrixVersionIdx: index("idx_traceability_matrix_version").on(table.version),
    traceabilityMatrixStatusIdx: index("idx_traceability_matrix_status").on(table.status),
  }),
);

export type RequirementTestcaseLink = typeof requirementTestcaseMap.$inferSelect;
export type NewRequirementTestcaseLink = typeof requirementTestcaseMap.$inferInsert;
export type TraceabilityMatrixRow = typeof traceabilityMatrix.$inferSelect;
export type NewTraceabilityMatrixRow = typeof traceabilityMatrix.$inferInsert;
