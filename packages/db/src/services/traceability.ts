import {
  sectionSchema,
  traceabilityMatrixSchema,
  type SectionInput,
  type TraceabilityMatrixInput,
} from '@traceforge/schema'
import { and, asc, eq } from 'drizzle-orm'
import type { Database } from '../registry'
import { sections, testcaseSectionMap, type Section, type TestcaseSectionLink } from '../schema/sections'
import {
  requirementTestcaseMap,
  traceabilityMatrix,
  type RequirementTestcaseLink,
  type TraceabilityMatrixRow,
} from '../schema/traceability'
import { requirementSectionsView, type RequirementSection } from '../schema/views'

export type RequirementTestcaseLinkInput = {
  requirementId: string
  requirementVersion: number
  testcaseId: string
  testcaseVersion: number
}

export type TestcaseSectionLinkInput = {
  testcaseId: string
  testcaseVersion: number
  sectionId: string
}

/** Sections, version-stamped links and the per-version traceability matrix. */
export function createTraceabilityService(db: Database) {
  async function createSection(input: SectionInput): Promise<Section> {
    const parsed = sectionSchema.parse(input)
    const [row] = await db
      .insert(sections)
      .values({
        tenantId: parsed.tenantId,
        sectionName: parsed.sectionName,
        source: parsed.source,
        externalSectionId: parsed.externalSectionId ?? null,
        externalSuiteId: parsed.externalSuiteId ?? null,
        description: parsed.description ?? null,
      })
      .returning()
    return row
  }

  /**
   * Links one requirement version to one testcase version. The link is
   * stamped with the requirement version; linking twice returns the
   * existing row.
   */
  async function linkRequirementTestcase(
    input: RequirementTestcaseLinkInput,
  ): Promise<RequirementTestcaseLink> {
    const [inserted] = await db
      .insert(requirementTestcaseMap)
      .values({ ...input, linkedAtVersion: input.requirementVersion })
      .onConflictDoNothing()
      .returning()
    if (inserted) return inserted

    const [existing] = await db
      .select()
      .from(requirementTestcaseMap)
      .where(
        and(
          eq(requirementTestcaseMap.requirementId, input.requirementId),
          eq(requirementTestcaseMap.requirementVersion, input.requirementVersion),
          eq(requirementTestcaseMap.testcaseId, input.testcaseId),
          eq(requirementTestcaseMap.testcaseVersion, input.testcaseVersion),
        ),
      )
      .limit(1)
    return existing
  }

  /**
   * A testcase sits in a section once; linking a newer version moves the
   * stamp forward.
   */
  async function linkTestcaseToSection(
    input: TestcaseSectionLinkInput,
  ): Promise<TestcaseSectionLink> {
    const [row] = await db
      .insert(testcaseSectionMap)
      .values({
        testcaseId: input.testcaseId,
        sectionId: input.sectionId,
        linkedAtVersion: input.testcaseVersion,
      })
      .onConflictDoUpdate({
        target: [testcaseSectionMap.testcaseId, testcaseSectionMap.sectionId],
        set: { linkedAtVersion: input.testcaseVersion },
      })
      .returning()
    return row
  }

  async function listSectionsForRequirement(requirementId: string): Promise<RequirementSection[]> {
    return db
      .select()
      .from(requirementSectionsView)
      .where(eq(requirementSectionsView.requirementId, requirementId))
      .orderBy(asc(requirementSectionsView.sectionName))
  }

  async function upsertTraceabilityMatrix(
    input: TraceabilityMatrixInput,
  ): Promise<TraceabilityMatrixRow> {
    const parsed = traceabilityMatrixSchema.parse(input)
    const traceabilityData = parsed.traceabilityData ?? null
    const [row] = await db
      .insert(traceabilityMatrix)
      .values({
        requirementId: parsed.requirementId,
        version: parsed.version,
        status: parsed.status,
        traceabilityData,
      })
      .onConflictDoUpdate({
        target: [traceabilityMatrix.requirementId, traceabilityMatrix.version],
        set: { status: parsed.status, traceabilityData },
      })
      .returning()
    return row
  }

  return {
    createSection,
    linkRequirementTestcase,
    linkTestcaseToSection,
    listSectionsForRequirement,
    upsertTraceabilityMatrix,
  }
}

export type TraceabilityService = ReturnType<typeof createTraceabilityService>
