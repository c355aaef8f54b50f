import {
  foreignKey,
  index,
  integer,
  pgTable,
  serial,
  text,
  unique,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { createdAtNullable } from "./_common";
import { sectionSources } from "./enums";
import { tenants } from "./tenants";
import { testcases } from "./testcases";

/**
 * sections
 *
 * Named grouping of testcases. `source` tags where the section came from:
 * created here (`internal`) or mirrored from one TCM tool.
 */
export const sections = pgTable(
  "sections",
  {
    sectionId: uuid("section_id").primaryKey().defaultRandom(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" }),
    sectionName: text("section_name").notNull(),
    source: text("source", { enum: sectionSources }).default("internal"),
    externalSectionId: text("external_section_id"),
    externalSuiteId: text("external_suite_id"),
    description: text("description"),
    createdAt: createdAtNullable,
  },
  (table) => ({
    sectionsTenantNameKey: unique("sections_tenant_id_section_name_key").on(
      table.tenantId,
      table.sectionName,
    ),
    sectionsTenantIdx: index("idx_sections_tenant_id").on(table.tenantId),
    sectionsNameIdx: index("idx_sections_name").on(table.sectionName),
    sectionsTenantNameUnique: uniqueIndex("ux_sections_tenant_name").on(
      table.tenantId,
      table.sectionName,
    ),
  }),
);

/**
 * testcase_section_map
 *
 * Many-to-many link between one testcase *version* and a section. The link is
 * version-stamped through `linked_at_version` and cascades away with either
 * the testcase version or the section.
 */
export const testcaseSectionMap = pgTable(
  "testcase_section_map",
  {
    mapId: serial("map_id").primaryKey(),
    testcaseId: uuid("testcase_id").notNull(),
    sectionId: uuid("section_id")
      .notNull()
      .references(() => sections.sectionId, { onDelete: "cascade" }),
    linkedAtVersion: integer("linked_at_version").notNull(),
    createdAt: createdAtNullable,
  },
  (table) => ({
    testcaseSectionMapVersionKey: unique().on(
      table.testcaseId,
      table.sectionId,
      table.linkedAtVersion,
    ),
    testcaseSectionMapTestcaseVersionFk: foreignKey({
      columns: [table.testcaseId, table.linkedAtVersion],
      foreignColumns: [testcases.testcaseId, testcases.version],
      name: "testcase_section_map_testcase_id_linked_at_version_fkey",
    }).onDelete("cascade"),
    testcaseSectionMapTestcaseIdx: index("idx_tsm_testcase_id").on(table.testcaseId),
    testcaseSectionMapSectionIdx: index("idx_tsm_section_id").on(table.sectionId),
    /** One link per (testcase, section) regardless of version. */
    testcaseSectionMapUnique: uniqueIndex("ux_tsm_testcase_section").on(
      table.testcaseId,
      table.sectionId,
    ),
  }),
);

export type Section = typeof sections.$inferSelect;
export type NewSection = typeof sections.$inferInsert;
export type TestcaseSectionLink = typeof testcaseSectionMap.$inferSelect;
export type NewTestcaseSectionLink = typeof testcaseSectionMap.$inferInsert;
