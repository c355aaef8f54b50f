import { randomUUID } from 'node:crypto'
import {
  createTestcaseSchema,
  testcaseRevisionSchema,
  type CreateTestcaseInput,
  type TestcaseRevision,
} from '@traceforge/schema'
import { and, asc, desc, eq } from 'drizzle-orm'
import { NotFoundError, VersionConflictError, isUniqueViolation } from '../errors'
import type { Database } from '../registry'
import { testcases, type Testcase } from '../schema/testcases'
import type { AppendOptions } from './requirements'

/**
 * Append-only access to testcase history.
 *
 * Each appended version records the row it was revised from in
 * `derived_from_row_id`, so any row can be walked back to its root.
 */
export function createTestcaseHistory(db: Database) {
  async function getRow(rowId: number): Promise<Testcase | null> {
    const [row] = await db.select().from(testcases).where(eq(testcases.rowId, rowId)).limit(1)
    return row ?? null
  }

  async function getVersion(testcaseId: string, version: number): Promise<Testcase | null> {
    const [row] = await db
      .select()
      .from(testcases)
      .where(and(eq(testcases.testcaseId, testcaseId), eq(testcases.version, version)))
      .limit(1)
    return row ?? null
  }

  async function getLatest(testcaseId: string): Promise<Testcase | null> {
    const [row] = await db
      .select()
      .from(testcases)
      .where(eq(testcases.testcaseId, testcaseId))
      .orderBy(desc(testcases.version))
      .limit(1)
    return row ?? null
  }

  async function listVersions(testcaseId: string): Promise<Testcase[]> {
    return db
      .select()
      .from(testcases)
      .where(eq(testcases.testcaseId, testcaseId))
      .orderBy(asc(testcases.version))
  }

  async function create(input: CreateTestcaseInput): Promise<Testcase> {
    const parsed = createTestcaseSchema.parse(input)
    const [row] = await db
      .insert(testcases)
      .values({
        testcaseId: randomUUID(),
        requirementId: parsed.requirementId,
        title: parsed.title,
        steps: parsed.steps,
        expectedResult: parsed.expectedResult,
        status: parsed.status,
        syncStatus: 'NEW',
        version: 1,
        priority: parsed.priority,
        metaInfo: parsed.metaInfo ?? null,
      })
      .returning()
    return row
  }

  async function appendVersion(
    testcaseId: string,
    revision: TestcaseRevision,
    options: AppendOptions = {},
  ): Promise<Testcase> {
    const changes = testcaseRevisionSchema.parse(revision)
    const base =
      options.baseVersion === undefined
        ? await getLatest(testcaseId)
        : await getVersion(testcaseId, options.baseVersion)
    if (!base) {
      throw new NotFoundError('testcase', testcaseId)
    }

    const version = base.version + 1
    try {
      const [row] = await db
        .insert(testcases)
        .values({
          testcaseId,
          requirementId: base.requirementId,
          title: changes.title ?? base.title,
          steps: changes.steps ?? base.steps,
          expectedResult: changes.expectedResult ?? base.expectedResult,
          status: changes.status ?? base.status,
          syncStatus: 'UPDATED',
          version,
          priority: changes.priority ?? base.priority,
          derivedFromRowId:
            changes.derivedFromRowId === undefined ? base.rowId : changes.derivedFromRowId,
          metaInfo: changes.metaInfo === undefined ? base.metaInfo : changes.metaInfo,
        })
        .returning()
      return row
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new VersionConflictError('testcase', testcaseId, version, { cause: error })
      }
      throw error
    }
  }

  async function markSynced(testcaseId: string, version: number): Promise<Testcase> {
    const [row] = await db
      .update(testcases)
      .set({ syncStatus: 'SYNCHED' })
      .where(and(eq(testcases.testcaseId, testcaseId), eq(testcases.version, version)))
      .returning()
    if (!row) {
      throw new NotFoundError('testcase', `${testcaseId}@${version}`)
    }
    return row
  }

  /**
   * The row followed by each ancestor up to the root (the first row with no
   * `derived_from_row_id`).
   */
  async function getProvenance(rowId: number): Promise<Testcase[]> {
    const chain: Testcase[] = []
    const seen = new Set<number>()
    let next: number | null = rowId

    while (next !== null && !seen.has(next)) {
      seen.add(next)
      const row = await getRow(next)
      if (!row) {
        if (chain.length === 0) throw new NotFoundError('testcase row', String(rowId))
        break
      }
      chain.push(row)
      next = row.derivedFromRowId
    }
    return chain
  }

  return {
    create,
    appendVersion,
    getVersion,
    getLatest,
    listVersions,
    markSynced,
    getProvenance,
  }
}

export type TestcaseHistory = ReturnType<typeof createTestcaseHistory>
