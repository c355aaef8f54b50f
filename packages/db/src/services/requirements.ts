import { randomUUID } from 'node:crypto'
import {
  createRequirementSchema,
  requirementRevisionSchema,
  type CreateRequirementInput,
  type GenerationStatus,
  type RequirementRevision,
} from '@traceforge/schema'
import { and, asc, desc, eq } from 'drizzle-orm'
import {
  InvalidStatusTransitionError,
  NotFoundError,
  VersionConflictError,
  isUniqueViolation,
} from '../errors'
import type { Database } from '../registry'
import { requirements, type Requirement } from '../schema/requirements'

/**
 * Allowed `testcase_generation_status` moves. Everything else is rejected,
 * including staying put.
 */
export const generationTransitions: Record<GenerationStatus, readonly GenerationStatus[]> = {
  NOT_STARTED: ['IN_PROGRESS'],
  IN_PROGRESS: ['COMPLETED', 'FAILED'],
  COMPLETED: ['SYNCHED'],
  FAILED: ['SYNCHED'],
  SYNCHED: [],
}

export type AppendOptions = {
  /**
   * Version the revision was made against. When another writer already
   * appended past it, the append fails with {@link VersionConflictError}.
   * Defaults to the latest version.
   */
  baseVersion?: number
}

/**
 * Append-only access to requirement history.
 *
 * Content columns are written once, on insert. The only in-place update is
 * the generation status of one version.
 */
export function createRequirementHistory(db: Database) {
  async function getVersion(requirementId: string, version: number): Promise<Requirement | null> {
    const [row] = await db
      .select()
      .from(requirements)
      .where(and(eq(requirements.requirementId, requirementId), eq(requirements.version, version)))
      .limit(1)
    return row ?? null
  }

  async function getLatest(requirementId: string): Promise<Requirement | null> {
    const [row] = await db
      .select()
      .from(requirements)
      .where(eq(requirements.requirementId, requirementId))
      .orderBy(desc(requirements.version))
      .limit(1)
    return row ?? null
  }

  async function listVersions(requirementId: string): Promise<Requirement[]> {
    return db
      .select()
      .from(requirements)
      .where(eq(requirements.requirementId, requirementId))
      .orderBy(asc(requirements.version))
  }

  async function create(input: CreateRequirementInput): Promise<Requirement> {
    const parsed = createRequirementSchema.parse(input)
    const [row] = await db
      .insert(requirements)
      .values({
        requirementId: randomUUID(),
        tenantId: parsed.tenantId,
        labelId: parsed.labelId,
        title: parsed.title,
        version: 1,
        rawText: parsed.rawText ?? null,
        requirementDetail: parsed.detail,
        metaInfo: parsed.metaInfo ?? null,
        testcaseGenerationStatus: 'NOT_STARTED',
      })
      .returning()
    return row
  }

  async function appendVersion(
    requirementId: string,
    revision: RequirementRevision,
    options: AppendOptions = {},
  ): Promise<Requirement> {
    const changes = requirementRevisionSchema.parse(revision)
    const base =
      options.baseVersion === undefined
        ? await getLatest(requirementId)
        : await getVersion(requirementId, options.baseVersion)
    if (!base) {
      throw new NotFoundError('requirement', requirementId)
    }

    const version = base.version + 1
    try {
      const [row] = await db
        .insert(requirements)
        .values({
          requirementId,
          tenantId: base.tenantId,
          labelId: changes.labelId ?? base.labelId,
          title: changes.title ?? base.title,
          version,
          rawText: changes.rawText === undefined ? base.rawText : changes.rawText,
          requirementDetail: changes.detail ?? base.requirementDetail,
          metaInfo: changes.metaInfo === undefined ? base.metaInfo : changes.metaInfo,
          testcaseGenerationStatus: 'NOT_STARTED',
        })
        .returning()
      return row
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new VersionConflictError('requirement', requirementId, version, { cause: error })
      }
      throw error
    }
  }

  async function advanceGenerationStatus(
    requirementId: string,
    version: number,
    next: GenerationStatus,
  ): Promise<Requirement> {
    const current = await getVersion(requirementId, version)
    if (!current) {
      throw new NotFoundError('requirement', `${requirementId}@${version}`)
    }
    const from = current.testcaseGenerationStatus ?? 'NOT_STARTED'
    if (!generationTransitions[from].includes(next)) {
      throw new InvalidStatusTransitionError('requirement', from, next)
    }

    // Compare-and-set: a concurrent move makes the WHERE miss.
    const [row] = await db
      .update(requirements)
      .set({ testcaseGenerationStatus: next })
      .where(
        and(
          eq(requirements.rowId, current.rowId),
          eq(requirements.testcaseGenerationStatus, from),
        ),
      )
      .returning()
    if (!row) {
      throw new InvalidStatusTransitionError('requirement', from, next)
    }
    return row
  }

  return {
    create,
    appendVersion,
    getVersion,
    getLatest,
    listVersions,
    advanceGenerationStatus,
  }
}

export type RequirementHistory = ReturnType<typeof createRequirementHistory>
