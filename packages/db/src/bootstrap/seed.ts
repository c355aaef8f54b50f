import { planLimitsSchema, type PlanLimits } from '@traceforge/schema'
import { sql } from 'drizzle-orm'
import { PgDialect } from 'drizzle-orm/pg-core'
import { SchemaPlanError } from '../errors'
import { DEFAULT_TENANT_ID } from '../schema/tenants'

type SeedValue = string | number | boolean | null

type SeedRow = Record<string, SeedValue>

/** Declarative "insert if absent" fixture for one table. */
export type SeedFixture = {
  table: string
  /** Unique key that makes a second run a no-op. */
  conflictColumn: string
  rows: readonly SeedRow[]
}

type PlanFixture = {
  name: string
  description: string
  price: string
  duration: 'monthly' | 'yearly' | 'lifetime'
  limits: PlanLimits
}

export const defaultTenant = {
  tenant_id: DEFAULT_TENANT_ID,
  tenant_name: 'Default Tenant',
  tenant_type: 'ORGANIZATION',
  tenant_state: 'ACTIVE',
  primary_domain: 'default.testcase-platform.com',
} satisfies SeedRow

export const defaultPlans: readonly PlanFixture[] = [
  {
    name: 'Free',
    description: 'Default free plan with limited features',
    price: '0.00',
    duration: 'monthly',
    limits: { uploads: 5, testcases: 50, api_calls: 1000 },
  },
  {
    name: 'Pro',
    description: 'Professional plan with enhanced features',
    price: '99.00',
    duration: 'monthly',
    limits: { uploads: 500, testcases: 5000, api_calls: 100000 },
  },
  {
    name: 'Unlimited',
    description: 'Standalone unlimited plan',
    price: '0.00',
    duration: 'lifetime',
    limits: { uploads: -1, testcases: -1, api_calls: -1 },
  },
]

export const seedFixtures: readonly SeedFixture[] = [
  { table: 'tenants', conflictColumn: 'tenant_id', rows: [defaultTenant] },
  {
    table: 'plans',
    conflictColumn: 'name',
    rows: defaultPlans.map((plan) => ({
      name: plan.name,
      description: plan.description,
      price: plan.price,
      duration: plan.duration,
      limits: JSON.stringify(planLimitsSchema.parse(plan.limits)),
      is_active: true,
    })),
  },
]

const dialect = new PgDialect()

/**
 * Renders one fixture as a single `INSERT ... ON CONFLICT DO NOTHING`.
 *
 * Values are inlined as escaped literals so the statement runs through the
 * same plain-text path as the DDL.
 */
export function renderSeed(fixture: SeedFixture): string {
  const [first] = fixture.rows
  if (!first) {
    throw new SchemaPlanError(`Seed fixture for ${fixture.table} has no rows`)
  }
  const columns = Object.keys(first)
  const values = fixture.rows.map(
    (row) => sql`(${sql.join(
      columns.map((column) => sql`${row[column] ?? null}`),
      sql`, `,
    )})`,
  )
  const statement = sql`INSERT INTO ${sql.identifier(fixture.table)} (${sql.join(
    columns.map((column) => sql.identifier(column)),
    sql`, `,
  )}) VALUES ${sql.join(values, sql`, `)} ON CONFLICT (${sql.identifier(
    fixture.conflictColumn,
  )}) DO NOTHING;`
  return dialect.sqlToQuery(statement.inlineParams()).sql
}
