import { sql } from "drizzle-orm";
import {
  boolean,
  check,
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  unique,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { createdAt, lastSyncedAt, withTimestamps } from "./_common";
import { syncDirections, tcmTools } from "./enums";
import { tenants } from "./tenants";

/**
 * tcm_integrations
 *
 * One configured external test-case-management tool instance per row.
 */
export const tcmIntegrations = pgTable(
  "tcm_integrations",
  {
    integrationId: uuid("integration_id").primaryKey().defaultRandom(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.tenantId, { onDelete: "cascade" }),
    integratorType: varchar("integrator_type", { length: 50, enum: tcmTools }).notNull(),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description"),
    isActive: boolean("is_active").default(true),
    ...withTimestamps(),
  },
  (table) => ({
    tcmIntegrationsTenantIdx: index("idx_tcm_integrations_tenant_id").on(table.tenantId),
    tcmIntegrationsTypeIdx: index("idx_tcm_integrations_integrator_type").on(
      table.integratorType,
    ),
  }),
);

/**
 * tcm_credentials
 *
 * Exactly one credential record per integration (kept single by the access
 * layer). Auth is an API key or a username/password pair.
 */
export const tcmCredentials = pgTable(
  "tcm_credentials",
  {
    credentialId: uuid("credential_id").primaryKey().defaultRandom(),
    integrationId: uuid("integration_id")
      .notNull()
      .references(() => tcmIntegrations.integrationId, { onDelete: "cascade" }),
    baseUrl: text("base_url").notNull(),
    apiKey: text("api_key"),
    username: text("username"),
    password: text("password"),
    ...withTimestamps(),
  },
  (table) => ({
    tcmCredentialsIntegrationIdx: index("idx_tcm_credentials_integration_id").on(
      table.integrationId,
    ),
    tcmCredentialsAuthMethodCheck: check(
      "check_auth_method",
      sql`(api_key IS NOT NULL AND api_key != '') OR (username IS NOT NULL AND username != '' AND password IS NOT NULL AND password != '')`,
    ),
  }),
);

/**
 * tcm_testcase_mappings
 *
 * Internal testcase to external TCM id; one external id per (testcase, tool).
 * Deleting a row fires `trg_cascade_tcm_mapping_delete`, which drops the
 * testcase's links into sections mirrored from the same tool.
 */
export const tcmTestcaseMappings = pgTable(
  "tcm_testcase_mappings",
  {
    mappingId: serial("mapping_id").primaryKey(),
    testcaseId: uuid("testcase_id").notNull(),
    tcmTool: text("tcm_tool", { enum: tcmTools }).notNull(),
    externalTestcaseId: text("external_testcase_id").notNull(),
    syncDirection: text("sync_direction", { enum: syncDirections }).default("BIDIRECTIONAL"),
    lastSyncedAt: timestamp("last_synced_at", { withTimezone: true }),
  },
  (table) => ({
    tcmTestcaseMappingsKey: unique("tcm_testcase_mappings_testcase_id_tcm_tool_key").on(
      table.testcaseId,
      table.tcmTool,
    ),
    tcmTestcaseMappingsToolIdx: index("idx_tcm_tc_mappings_tool").on(table.tcmTool),
    tcmTestcaseMappingsExternalIdx: index("idx_tcm_tc_mappings_external").on(
      table.externalTestcaseId,
    ),
    tcmTestcaseMappingsUnique: uniqueIndex("ux_tcm_tc_map_testcase_tool").on(
      table.testcaseId,
      table.tcmTool,
    ),
  }),
);

// -----------------------------------------------------------------------------
// Tool-specific project catalogs mirrored from the external systems
// -----------------------------------------------------------------------------

export const testrailProjects = pgTable(
  "testrail_projects",
  {
    projectId: serial("project_id").primaryKey(),
    integrationId: uuid("integration_id")
      .notNull()
      .references(() => tcmIntegrations.integrationId, { onDelete: "cascade" }),
    externalProjectId: integer("external_project_id").notNull(),
    projectName: varchar("project_name", { length: 255 }).notNull(),
    projectDescription: text("project_description"),

    /** TestRail suite mode (1 single suite, 2 single + baselines, 3 multiple). */
    projectMode: integer("project_mode").default(0),

    isActive: boolean("is_active").default(true).notNull(),
    createdAt,
    lastSyncedAt,
  },
  (table) => ({
    testrailProjectsIntegrationIdx: index("idx_testrail_projects_integration_id").on(
      table.integrationId,
    ),
    testrailProjectsExternalIdx: index("idx_testrail_projects_external_id").on(
      table.externalProjectId,
    ),
    testrailProjectsActiveIdx: index("idx_testrail_projects_is_active").on(table.isActive),
    testrailProjectsModeIdx: index("idx_testrail_projects_mode").on(table.projectMode),
  }),
);

export const testrailSuites = pgTable(
  "testrail_suites",
  {
    suiteId: serial("suite_id").primaryKey(),
    projectId: integer("project_id")
      .notNull()
      .references(() => testrailProjects.projectId, { onDelete: "cascade" }),
    externalSuiteId: integer("external_suite_id").notNull(),
    suiteName: varchar("suite_name", { length: 255 }).notNull(),
    suiteDescription: text("suite_description"),
    isActive: boolean("is_active").default(false).notNull(),
    createdAt,
    lastSyncedAt,
  },
  (table) => ({
    testrailSuitesKey: unique("testrail_suites_project_id_external_suite_id_key").on(
      table.projectId,
      table.externalSuiteId,
    ),
    testrailSuitesProjectIdx: index("idx_testrail_suites_project_id").on(table.projectId),
    testrailSuitesExternalIdx: index("idx_testrail_suites_external_id").on(
      table.externalSuiteId,
    ),
    testrailSuitesActiveIdx: index("idx_testrail_suites_is_active").on(table.isActive),
  }),
);

export const zephyrProjects = pgTable(
  "zephyr_projects",
  {
    projectId: serial("project_id").primaryKey(),
    integrationId: uuid("integration_id")
      .notNull()
      .references(() => tcmIntegrations.integrationId, { onDelete: "cascade" }),
    projectKey: varchar("project_key", { length: 50 }).notNull(),
    projectName: varchar("project_name", { length: 255 }).notNull(),
    projectLead: varchar("project_lead", { length: 255 }),
    createdAt,
    lastSyncedAt,
  },
  (table) => ({
    zephyrProjectsIntegrationIdx: index("idx_zephyr_projects_integration_id").on(
      table.integrationId,
    ),
    zephyrProjectsKeyIdx: index("idx_zephyr_projects_project_key").on(table.projectKey),
  }),
);

export const xrayProjects = pgTable(
  "xray_projects",
  {
    projectId: serial("project_id").primaryKey(),
    integrationId: uuid("integration_id")
      .notNull()
      .references(() => tcmIntegrations.integrationId, { onDelete: "cascade" }),
    projectKey: varchar("project_key", { length: 50 }).notNull(),
    projectName: varchar("project_name", { length: 255 }).notNull(),
    projectType: varchar("project_type", { length: 50 }),
    createdAt,
    lastSyncedAt,
  },
  (table) => ({
    xrayProjectsIntegrationIdx: index("idx_xray_projects_integration_id").on(
      table.integrationId,
    ),
    xrayProjectsKeyIdx: index("idx_xray_projects_project_key").on(table.projectKey),
  }),
);

export type TcmIntegration = typeof tcmIntegrations.$inferSelect;
export type NewTcmIntegration = typeof tcmIntegrations.$inferInsert;
export type TcmCredential = typeof tcmCredentials.$inferSelect;
export type NewTcmCredential = typeof tcmCredentials.$inferInsert;
export type TcmTestcaseMapping = typeof tcmTestcaseMappings.$inferSelect;
export type NewTcmTestcaseMapping = typeof tcmTestcaseMappings.$inferInsert;
export type TestrailProject = typeof testrailProjects.$inferSelect;
export type NewTestrailProject = typeof testrailProjects.$inferInsert;
export type TestrailSuite = typeof testrailSuites.$inferSelect;
export type NewTestrailSuite = typeof testrailSuites.$inferInsert;
export type ZephyrProject = typeof zephyrProjects.$inferSelect;
export type NewZephyrProject = typeof zephyrProjects.$inferInsert;
export type XrayProject = typeof xrayProjects.$inferSelect;
export type NewXrayProject = typeof xrayProjects.$inferInsert;
