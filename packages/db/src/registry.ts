import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import * as billingSchema from './schema/billing'
import * as requirementsSchema from './schema/requirements'
import * as sectionsSchema from './schema/sections'
import * as tcmSchema from './schema/tcm'
import * as tenantsSchema from './schema/tenants'
import * as testcasesSchema from './schema/testcases'
import * as traceabilitySchema from './schema/traceability'
import * as usersSchema from './schema/users'

/**
 * Unified drizzle schema registry.
 *
 * Order follows the bootstrap plan:
 * 1) tenant + identity roots
 * 2) versioned requirement/testcase history
 * 3) sections + traceability links
 * 4) TCM integrations
 * 5) billing
 *
 * `requirement_sections_v` is created by the plan and queried directly, so it
 * is not registered here.
 */
export const schema = {
  tenants: tenantsSchema.tenants,
  users: usersSchema.users,
  requirementLabels: requirementsSchema.requirementLabels,
  requirements: requirementsSchema.requirements,
  testcases: testcasesSchema.testcases,
  sections: sectionsSchema.sections,
  testcaseSectionMap: sectionsSchema.testcaseSectionMap,
  requirementTestcaseMap: traceabilitySchema.requirementTestcaseMap,
  traceabilityMatrix: traceabilitySchema.traceabilityMatrix,
  tcmIntegrations: tcmSchema.tcmIntegrations,
  tcmCredentials: tcmSchema.tcmCredentials,
  tcmTestcaseMappings: tcmSchema.tcmTestcaseMappings,
  testrailProjects: tcmSchema.testrailProjects,
  testrailSuites: tcmSchema.testrailSuites,
  zephyrProjects: tcmSchema.zephyrProjects,
  xrayProjects: tcmSchema.xrayProjects,
  plans: billingSchema.plans,
  subscriptions: billingSchema.subscriptions,
  usage: billingSchema.usage,
}

/**
 * Any drizzle PostgreSQL database over this schema: `node-postgres` in
 * production, PGlite in tests.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>
