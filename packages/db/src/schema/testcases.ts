import type { TestcaseStep } from "@traceforge/schema";
import {
  type AnyPgColumn,
  bigint,
  bigserial,
  index,
  integer,
  json,
  pgTable,
  text,
  unique,
  uuid,
} from "drizzle-orm/pg-core";
import { withTimestamps } from "./_common";
import { syncStatuses } from "./enums";

/**
 * testcases
 *
 * Same versioning pattern as `requirements`: (testcase_id, version) is unique
 * and each version row is immutable content.
 *
 * `derived_from_row_id` is a provenance back-reference to the row this one was
 * generated or revised from. It never cascades: deleting a child must not
 * touch its ancestors.
 */
export const testcases = pgTable(
  "testcases",
  {
    testcaseId: uuid("testcase_id").notNull(),
    rowId: bigserial("row_id", { mode: "number" }).primaryKey(),

    /** Logical requirement id (any version); not a foreign key. */
    requirementId: uuid("requirement_id").notNull(),

    title: text("title").notNull(),
    steps: json("steps").$type<TestcaseStep[]>().notNull(),
    expectedResult: text("expected_result").notNull(),

    /** Free-form workflow status owned by the application. */
    status: text("status").notNull(),

    syncStatus: text("sync_status", { enum: syncStatuses }).default("NEW"),
    version: integer("version").notNull(),
    priority: text("priority").default("MEDIUM"),
    derivedFromRowId: bigint("derived_from_row_id", { mode: "number" }).references(
      (): AnyPgColumn => testcases.rowId,
    ),
    ...withTimestamps("loose"),
    metaInfo: json("meta_info").$type<Record<string, unknown>>(),
  },
  (table) => ({
    testcasesIdVersionUnique: unique("testcases_testcase_id_version_key").on(
      table.testcaseId,
      table.version,
    ),
    testcasesTestcaseIdx: index("idx_testcases_testcase_id").on(table.testcaseId),
    testcasesRequirementIdx: index("idx_testcases_requirement_id").on(table.requirementId),
    testcasesVersionIdx: index("idx_testcases_version").on(table.testcaseId, table.version),
    testcasesDerivedFromIdx: index("idx_testcases_derived_from").on(table.derivedFromRowId),
    testcasesRequirementVersionIdx: index("idx_testcases_req_id_version").on(
      table.requirementId,
      table.version,
    ),
  }),
);

export type Testcase = typeof testcases.$inferSelect;
export type NewTestcase = typeof testcases.$inferInsert;
