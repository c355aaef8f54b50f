import {
  tcmCredentialInputSchema,
  tcmIntegrationSchema,
  tcmTestcaseMappingSchema,
  type TcmCredentialInput,
  type TcmIntegrationInput,
  type TcmTestcaseMappingInput,
  type TcmTool,
} from '@traceforge/schema'
import { and, eq } from 'drizzle-orm'
import { NotFoundError } from '../errors'
import type { Database } from '../registry'
import {
  tcmCredentials,
  tcmIntegrations,
  tcmTestcaseMappings,
  type TcmCredential,
  type TcmIntegration,
  type TcmTestcaseMapping,
} from '../schema/tcm'

/** TCM tool integrations, their single credential and testcase mappings. */
export function createTcmService(db: Database) {
  async function createIntegration(input: TcmIntegrationInput): Promise<TcmIntegration> {
    const parsed = tcmIntegrationSchema.parse(input)
    const [row] = await db
      .insert(tcmIntegrations)
      .values({
        tenantId: parsed.tenantId,
        integratorType: parsed.integratorType,
        name: parsed.name,
        description: parsed.description ?? null,
        isActive: parsed.isActive,
      })
      .returning()
    return row
  }

  /**
   * Replaces whatever credential the integration had. The integration row is
   * locked first, so concurrent saves for one integration run one at a time.
   */
  async function saveCredential(
    integrationId: string,
    input: TcmCredentialInput,
  ): Promise<TcmCredential> {
    const parsed = tcmCredentialInputSchema.parse(input)
    return db.transaction(async (tx) => {
      const [integration] = await tx
        .select({ integrationId: tcmIntegrations.integrationId })
        .from(tcmIntegrations)
        .where(eq(tcmIntegrations.integrationId, integrationId))
        .for('update')
      if (!integration) {
        throw new NotFoundError('tcm integration', integrationId)
      }

      await tx.delete(tcmCredentials).where(eq(tcmCredentials.integrationId, integrationId))
      const [row] = await tx
        .insert(tcmCredentials)
        .values({
          integrationId,
          baseUrl: parsed.baseUrl,
          apiKey: parsed.apiKey ?? null,
          username: parsed.username ?? null,
          password: parsed.password ?? null,
        })
        .returning()
      return row
    })
  }

  async function getCredential(integrationId: string): Promise<TcmCredential | null> {
    const [row] = await db
      .select()
      .from(tcmCredentials)
      .where(eq(tcmCredentials.integrationId, integrationId))
      .limit(1)
    return row ?? null
  }

  /** One external id per (testcase, tool); mapping again overwrites it. */
  async function mapTestcase(input: TcmTestcaseMappingInput): Promise<TcmTestcaseMapping> {
    const parsed = tcmTestcaseMappingSchema.parse(input)
    const [row] = await db
      .insert(tcmTestcaseMappings)
      .values(parsed)
      .onConflictDoUpdate({
        target: [tcmTestcaseMappings.testcaseId, tcmTestcaseMappings.tcmTool],
        set: {
          externalTestcaseId: parsed.externalTestcaseId,
          syncDirection: parsed.syncDirection,
        },
      })
      .returning()
    return row
  }

  /**
   * Removes the mapping. The delete trigger also drops the testcase's links
   * into sections mirrored from the same tool.
   */
  async function unmapTestcase(testcaseId: string, tool: TcmTool): Promise<boolean> {
    const removed = await db
      .delete(tcmTestcaseMappings)
      .where(and(eq(tcmTestcaseMappings.testcaseId, testcaseId), eq(tcmTestcaseMappings.tcmTool, tool)))
      .returning({ mappingId: tcmTestcaseMappings.mappingId })
    return removed.length > 0
  }

  async function markMappingSynced(
    testcaseId: string,
    tool: TcmTool,
    at: Date = new Date(),
  ): Promise<TcmTestcaseMapping> {
    const [row] = await db
      .update(tcmTestcaseMappings)
      .set({ lastSyncedAt: at })
      .where(and(eq(tcmTestcaseMappings.testcaseId, testcaseId), eq(tcmTestcaseMappings.tcmTool, tool)))
      .returning()
    if (!row) {
      throw new NotFoundError('tcm mapping', `${testcaseId}/${tool}`)
    }
    return row
  }

  return {
    createIntegration,
    saveCredential,
    getCredential,
    mapTestcase,
    unmapTestcase,
    markMappingSynced,
  }
}

export type TcmService = ReturnType<typeof createTcmService>
