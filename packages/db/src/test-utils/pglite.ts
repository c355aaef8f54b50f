import { randomUUID } from 'node:crypto'
import { PGlite } from '@electric-sql/pglite'
import { drizzle } from 'drizzle-orm/pglite'
import { SchemaInitializer } from '../bootstrap/initializer'
import type { SqlSession } from '../bootstrap/session'
import { schema, type Database } from '../registry'
import { requirementLabels } from '../schema/requirements'
import { tenants } from '../schema/tenants'

/**
 * In-process PostgreSQL for tests. `gen_random_uuid()` is in core, so no
 * extension is created.
 */
export async function createTestDatabase() {
  const client = new PGlite()
  const session: SqlSession = {
    async execute(statement) {
      await client.exec(statement)
    },
    // The PGlite instance outlives each bootstrap run.
    async release() {},
  }
  const initializer = new SchemaInitializer(async () => session, { extensions: [] })
  await initializer.initialize()

  const db: Database = drizzle(client, { schema })
  return {
    client,
    db,
    initializer,
    close: () => client.close(),
  }
}

export type TestDatabase = Awaited<ReturnType<typeof createTestDatabase>>

/** A fresh tenant with one requirement label. */
export async function createTenantWithLabel(db: Database, label = 'Functional') {
  const [tenant] = await db
    .insert(tenants)
    .values({ tenantId: randomUUID(), tenantName: 'Test Tenant', tenantType: 'ORGANIZATION' })
    .returning()
  const [requirementLabel] = await db
    .insert(requirementLabels)
    .values({ tenantId: tenant.tenantId, requirementLabel: label })
    .returning()
  return { tenant, label: requirementLabel }
}

export async function countRows(client: PGlite, table: string): Promise<number> {
  const result = await client.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${table}`)
  return result.rows[0].count
}
