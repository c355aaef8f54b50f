import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { NotFoundError } from '../../errors'
import { DEFAULT_TENANT_ID } from '../../schema/tenants'
import { countRows, createTestDatabase, type TestDatabase } from '../../test-utils/pglite'
import { createTcmService, type TcmService } from '../tcm'
import { createTestcaseHistory } from '../testcases'
import { createTraceabilityService } from '../traceability'

let testDb: TestDatabase
let tcm: TcmService
let testcaseId: string

beforeAll(async () => {
  testDb = await createTestDatabase()
  tcm = createTcmService(testDb.db)
})

afterAll(async () => {
  await testDb.close()
})

beforeEach(async () => {
  const testcase = await createTestcaseHistory(testDb.db).create({
    requirementId: '66666666-6666-4666-8666-666666666666',
    title: 'Checkout total',
    steps: [{ action: 'Add two items' }],
    expectedResult: 'Total is the sum',
    status: 'DRAFT',
  })
  testcaseId = testcase.testcaseId
})

describe('createTcmService', () => {
  it('keeps a single credential per integration', async () => {
    const integration = await tcm.createIntegration({
      tenantId: DEFAULT_TENANT_ID,
      integratorType: 'testrail',
      name: 'TestRail',
    })

    await tcm.saveCredential(integration.integrationId, {
      baseUrl: 'https://tcm.example.test',
      apiKey: 'test-secret',
    })
    const replaced = await tcm.saveCredential(integration.integrationId, {
      baseUrl: 'https://tcm.example.test',
      username: 'qa',
      password: 'test-secret',
    })

    const stored = await tcm.getCredential(integration.integrationId)
    expect(stored?.credentialId).toBe(replaced.credentialId)
    expect(stored?.apiKey).toBeNull()
    expect(stored?.username).toBe('qa')
  })

  it('refuses a credential for a missing integration', async () => {
    const missing = '77777777-7777-4777-8777-777777777777'
    const before = await countRows(testDb.client, 'tcm_credentials')

    await expect(
      tcm.saveCredential(missing, { baseUrl: 'https://tcm.example.test', apiKey: 'test-secret' }),
    ).rejects.toThrow(new NotFoundError('tcm integration', missing))
    expect(await countRows(testDb.client, 'tcm_credentials')).toBe(before)
  })

  it('rejects credentials without an auth method before touching the database', async () => {
    const integration = await tcm.createIntegration({
      tenantId: DEFAULT_TENANT_ID,
      integratorType: 'xray',
      name: 'Xray',
    })
    const before = await countRows(testDb.client, 'tcm_credentials')

    const error = await tcm
      .saveCredential(integration.integrationId, {
        baseUrl: 'https://tcm.example.test',
        username: 'qa',
      })
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ZodError)
    if (!(error instanceof ZodError)) return
    expect(error.issues[0].message).toBe('Provide an API key or both username and password')
    expect(await countRows(testDb.client, 'tcm_credentials')).toBe(before)
  })

  it('overwrites the external id when mapping the same tool again', async () => {
    const first = await tcm.mapTestcase({ testcaseId, tcmTool: 'zephyr', externalTestcaseId: 'Z-1' })

    const second = await tcm.mapTestcase({
      testcaseId,
      tcmTool: 'zephyr',
      externalTestcaseId: 'Z-2',
      syncDirection: 'PUSH',
    })

    expect(second.mappingId).toBe(first.mappingId)
    expect(second.externalTestcaseId).toBe('Z-2')
    expect(second.syncDirection).toBe('PUSH')
  })

  it('stamps the last sync time', async () => {
    await tcm.mapTestcase({ testcaseId, tcmTool: 'testrail', externalTestcaseId: 'C7' })
    const at = new Date('2026-03-01T12:00:00.000Z')

    const synced = await tcm.markMappingSynced(testcaseId, 'testrail', at)

    expect(synced.lastSyncedAt?.toISOString()).toBe('2026-03-01T12:00:00.000Z')
  })

  it('fails to mark a missing mapping synced', async () => {
    await expect(tcm.markMappingSynced(testcaseId, 'xray')).rejects.toThrow(
      `tcm mapping not found: ${testcaseId}/xray`,
    )
  })

  it('drops same-tool section links when unmapping', async () => {
    const traceability = createTraceabilityService(testDb.db)
    const mirrored = await traceability.createSection({
      tenantId: DEFAULT_TENANT_ID,
      sectionName: `TestRail ${testcaseId}`,
      source: 'testrail',
    })
    const local = await traceability.createSection({
      tenantId: DEFAULT_TENANT_ID,
      sectionName: `Local ${testcaseId}`,
    })
    for (const section of [mirrored, local]) {
      await traceability.linkTestcaseToSection({
        testcaseId,
        testcaseVersion: 1,
        sectionId: section.sectionId,
      })
    }
    await tcm.mapTestcase({ testcaseId, tcmTool: 'testrail', externalTestcaseId: 'C9' })

    expect(await tcm.unmapTestcase(testcaseId, 'testrail')).toBe(true)
    expect(await tcm.unmapTestcase(testcaseId, 'testrail')).toBe(false)

    const links = await testDb.client.query<{ section_id: string }>(
      'SELECT section_id FROM testcase_section_map WHERE testcase_id = $1',
      [testcaseId],
    )
    expect(links.rows).toEqual([{ section_id: local.sectionId }])
  })
})
