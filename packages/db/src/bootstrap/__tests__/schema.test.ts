/**
 * Runs the real bootstrap plan against PGlite and checks the constraints and
 * triggers it creates.
 */
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { DEFAULT_TENANT_ID } from '../../schema/tenants'
import { countRows, createTestDatabase, type TestDatabase } from '../../test-utils/pglite'

const tenantId = '11111111-1111-4111-8111-111111111111'
const requirementId = '22222222-2222-4222-8222-222222222222'
const testcaseId = '33333333-3333-4333-8333-333333333333'

let testDb: TestDatabase

async function snapshot() {
  const columns = await testDb.client.query(
    `SELECT table_name, column_name, data_type, is_nullable, column_default
     FROM information_schema.columns
     WHERE table_schema = 'public'
     ORDER BY table_name, ordinal_position`,
  )
  const indexes = await testDb.client.query(
    `SELECT indexname FROM pg_indexes WHERE schemaname = 'public' ORDER BY indexname`,
  )
  const triggers = await testDb.client.query(
    `SELECT trigger_name, event_object_table, event_manipulation
     FROM information_schema.triggers
     ORDER BY trigger_name, event_manipulation`,
  )
  return { columns: columns.rows, indexes: indexes.rows, triggers: triggers.rows }
}

async function seedTenantRequirementAndTestcase() {
  await testDb.client.query(
    `INSERT INTO tenants (tenant_id, tenant_name, tenant_type) VALUES ($1, 'Acme', 'ORGANIZATION')`,
    [tenantId],
  )
  const label = await testDb.client.query<{ label_id: number }>(
    `INSERT INTO requirement_labels (tenant_id, requirement_label) VALUES ($1, 'Functional') RETURNING label_id`,
    [tenantId],
  )
  await testDb.client.query(
    `INSERT INTO requirements (requirement_id, tenant_id, label_id, title, version, requirement_detail)
     VALUES ($1, $2, $3, 'Login', 1, '{}')`,
    [requirementId, tenantId, label.rows[0].label_id],
  )
  await testDb.client.query(
    `INSERT INTO testcases (testcase_id, requirement_id, title, steps, expected_result, status, version)
     VALUES ($1, $2, 'Valid login', '[]', 'Dashboard shown', 'DRAFT', 1)`,
    [testcaseId, requirementId],
  )
}

beforeAll(async () => {
  testDb = await createTestDatabase()
})

afterAll(async () => {
  await testDb.close()
})

describe('bootstrap plan on PostgreSQL', () => {
  it('rebuilds an identical schema when run again', async () => {
    const before = await snapshot()

    await testDb.initializer.initialize()

    expect(await snapshot()).toEqual(before)
    expect(before.indexes.length).toBeGreaterThan(55)
  })

  it('seeds exactly one default tenant and three plans', async () => {
    await testDb.initializer.initialize()

    expect(await countRows(testDb.client, 'tenants')).toBe(1)
    expect(await countRows(testDb.client, 'plans')).toBe(3)

    const tenant = await testDb.client.query<{ tenant_id: string; tenant_name: string }>(
      'SELECT tenant_id, tenant_name FROM tenants',
    )
    expect(tenant.rows).toEqual([{ tenant_id: DEFAULT_TENANT_ID, tenant_name: 'Default Tenant' }])

    const plans = await testDb.client.query<{ name: string; duration: string }>(
      'SELECT name, duration FROM plans ORDER BY name',
    )
    expect(plans.rows).toEqual([
      { name: 'Free', duration: 'monthly' },
      { name: 'Pro', duration: 'monthly' },
      { name: 'Unlimited', duration: 'lifetime' },
    ])
  })

  it('drops existing data on every run', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()
    expect(await countRows(testDb.client, 'requirements')).toBe(1)

    await testDb.initializer.initialize()

    expect(await countRows(testDb.client, 'requirements')).toBe(0)
    expect(await countRows(testDb.client, 'tenants')).toBe(1)
  })

  it('rejects a second row for the same requirement version', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()

    await expect(
      testDb.client.query(
        `INSERT INTO requirements (requirement_id, tenant_id, label_id, title, version, requirement_detail)
         SELECT requirement_id, tenant_id, label_id, 'Login again', 1, '{}' FROM requirements`,
      ),
    ).rejects.toThrow(/duplicate key value violates unique constraint/)
  })

  it('rejects links to a testcase version that does not exist', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()

    await expect(
      testDb.client.query(
        `INSERT INTO requirement_testcase_map
           (requirement_id, requirement_version, testcase_id, testcase_version, linked_at_version)
         VALUES ($1, 1, $2, 2, 1)`,
        [requirementId, testcaseId],
      ),
    ).rejects.toThrow(/violates foreign key constraint/)
  })

  it('rejects section links to a testcase version that does not exist', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()
    const section = await testDb.client.query<{ section_id: string }>(
      `INSERT INTO sections (tenant_id, section_name) VALUES ($1, 'Checkout') RETURNING section_id`,
      [tenantId],
    )

    await expect(
      testDb.client.query(
        `INSERT INTO testcase_section_map (testcase_id, section_id, linked_at_version) VALUES ($1, $2, 2)`,
        [testcaseId, section.rows[0].section_id],
      ),
    ).rejects.toThrow(
      'violates foreign key constraint "testcase_section_map_testcase_id_linked_at_version_fkey"',
    )
  })

  it('cascades links away when the testcase version is deleted', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()
    await testDb.client.query(
      `INSERT INTO requirement_testcase_map
         (requirement_id, requirement_version, testcase_id, testcase_version, linked_at_version)
       VALUES ($1, 1, $2, 1, 1)`,
      [requirementId, testcaseId],
    )

    await testDb.client.query('DELETE FROM testcases WHERE testcase_id = $1', [testcaseId])

    expect(await countRows(testDb.client, 'requirement_testcase_map')).toBe(0)
  })

  it('removes only same-tool section links when a TCM mapping is deleted', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()
    const sections = await testDb.client.query<{ section_id: string; source: string }>(
      `INSERT INTO sections (tenant_id, section_name, source)
       VALUES ($1, 'Local', 'internal'), ($1, 'TR Suite', 'testrail'), ($1, 'Zephyr Folder', 'zephyr')
       RETURNING section_id, source`,
      [tenantId],
    )
    for (const section of sections.rows) {
      await testDb.client.query(
        `INSERT INTO testcase_section_map (testcase_id, section_id, linked_at_version) VALUES ($1, $2, 1)`,
        [testcaseId, section.section_id],
      )
    }
    await testDb.client.query(
      `INSERT INTO tcm_testcase_mappings (testcase_id, tcm_tool, external_testcase_id) VALUES ($1, 'testrail', 'C100')`,
      [testcaseId],
    )

    await testDb.client.query('DELETE FROM tcm_testcase_mappings WHERE testcase_id = $1', [testcaseId])

    const remaining = await testDb.client.query<{ source: string }>(
      `SELECT s.source FROM testcase_section_map m
       JOIN sections s ON s.section_id = m.section_id
       ORDER BY s.source`,
    )
    expect(remaining.rows).toEqual([{ source: 'internal' }, { source: 'zephyr' }])
  })

  it('requires an API key or a username and password on credentials', async () => {
    await testDb.initializer.initialize()
    const integration = await testDb.client.query<{ integration_id: string }>(
      `INSERT INTO tcm_integrations (tenant_id, integrator_type, name)
       VALUES ($1, 'testrail', 'TestRail') RETURNING integration_id`,
      [DEFAULT_TENANT_ID],
    )
    const integrationId = integration.rows[0].integration_id

    await expect(
      testDb.client.query(
        `INSERT INTO tcm_credentials (integration_id, base_url, api_key, username) VALUES ($1, 'https://tcm.example.test', '', 'qa')`,
        [integrationId],
      ),
    ).rejects.toThrow(/violates check constraint "check_auth_method"/)

    await testDb.client.query(
      `INSERT INTO tcm_credentials (integration_id, base_url, username, password) VALUES ($1, 'https://tcm.example.test', 'qa', 'test-secret')`,
      [integrationId],
    )
    expect(await countRows(testDb.client, 'tcm_credentials')).toBe(1)
  })

  it('stamps updated_at on update', async () => {
    await testDb.initializer.initialize()
    await testDb.client.query(
      `UPDATE tenants SET updated_at = '2020-01-01T00:00:00Z' WHERE tenant_id = $1`,
      [DEFAULT_TENANT_ID],
    )
    const stale = await testDb.client.query<{ updated_at: Date }>(
      'SELECT updated_at FROM tenants WHERE tenant_id = $1',
      [DEFAULT_TENANT_ID],
    )
    // The trigger overrides any explicit value.
    expect(stale.rows[0].updated_at.getUTCFullYear()).toBeGreaterThan(2020)

    await testDb.client.query(`UPDATE tenants SET tenant_name = 'Renamed' WHERE tenant_id = $1`, [
      DEFAULT_TENANT_ID,
    ])
    const fresh = await testDb.client.query<{ stamped: boolean }>(
      'SELECT updated_at >= created_at AS stamped FROM tenants WHERE tenant_id = $1',
      [DEFAULT_TENANT_ID],
    )
    expect(fresh.rows[0].stamped).toBe(true)
  })

  it('exposes requirement sections through requirement_sections_v', async () => {
    await testDb.initializer.initialize()
    await seedTenantRequirementAndTestcase()
    const section = await testDb.client.query<{ section_id: string }>(
      `INSERT INTO sections (tenant_id, section_name) VALUES ($1, 'Auth') RETURNING section_id`,
      [tenantId],
    )
    await testDb.client.query(
      `INSERT INTO requirement_testcase_map
         (requirement_id, requirement_version, testcase_id, testcase_version, linked_at_version)
       VALUES ($1, 1, $2, 1, 1)`,
      [requirementId, testcaseId],
    )
    await testDb.client.query(
      `INSERT INTO testcase_section_map (testcase_id, section_id, linked_at_version) VALUES ($1, $2, 1)`,
      [testcaseId, section.rows[0].section_id],
    )

    const view = await testDb.client.query<{ section_name: string }>(
      'SELECT section_name FROM requirement_sections_v WHERE requirement_id = $1',
      [requirementId],
    )
    expect(view.rows).toEqual([{ section_name: 'Auth' }])
  })
})
