import { z } from 'zod'

export * from './enums'
import {
  matrixStatuses,
  priorities,
  sectionSources,
  syncDirections,
  tcmTools,
  usageMetrics,
} from './enums'

// Common schemas
export const idSchema = z.string().uuid()

/** Logical version counter; versions start at 1 and only ever grow. */
export const versionSchema = z.number().int().min(1)

// Requirement payloads

/**
 * `requirements.requirement_detail` is stored as JSON and stays open-ended:
 * known keys are typed, anything else is carried through untouched.
 */
export const requirementDetailSchema = z
  .object({
    description: z.string().optional(),
    acceptanceCriteria: z.array(z.string()).optional(),
    source: z.string().optional(),
  })
  .passthrough()

export const createRequirementSchema = z.object({
  tenantId: idSchema,
  labelId: z.number().int().positive(),
  title: z.string().min(1),
  rawText: z.string().nullable().optional(),
  detail: requirementDetailSchema,
  metaInfo: z.record(z.unknown()).nullable().optional(),
})

/** Fields a new requirement version may change; omitted ones carry forward. */
export const requirementRevisionSchema = createRequirementSchema
  .pick({ labelId: true, title: true, rawText: true, detail: true, metaInfo: true })
  .partial()

// Testcase payloads

export const testcaseStepSchema = z.object({
  action: z.string().min(1),
  expected: z.string().optional(),
  data: z.string().optional(),
})

export const testcaseStepsSchema = z.array(testcaseStepSchema)

export const createTestcaseSchema = z.object({
  requirementId: idSchema,
  title: z.string().min(1),
  steps: testcaseStepsSchema,
  expectedResult: z.string().min(1),
  status: z.string().min(1),
  priority: z.enum(priorities).default('MEDIUM'),
  metaInfo: z.record(z.unknown()).nullable().optional(),
})

export const testcaseRevisionSchema = createTestcaseSchema
  .omit({ requirementId: true })
  .partial()
  .extend({
    /** Explicit provenance parent; defaults to the latest row of the testcase. */
    derivedFromRowId: z.number().int().positive().nullable().optional(),
  })

// Sections

export const sectionSchema = z.object({
  tenantId: idSchema,
  sectionName: z.string().min(1),
  source: z.enum(sectionSources).default('internal'),
  externalSectionId: z.string().nullable().optional(),
  externalSuiteId: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
})

// TCM

export const tcmIntegrationSchema = z.object({
  tenantId: idSchema,
  integratorType: z.enum(tcmTools),
  name: z.string().min(1).max(255),
  description: z.string().nullable().optional(),
  isActive: z.boolean().default(true),
})

const nonEmpty = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value !== ''

/**
 * Mirrors the `check_auth_method` constraint on `tcm_credentials`:
 * a non-empty API key, or a non-empty username and password.
 */
export const tcmCredentialInputSchema = z
  .object({
    baseUrl: z.string().url(),
    apiKey: z.string().nullable().optional(),
    username: z.string().nullable().optional(),
    password: z.string().nullable().optional(),
  })
  .refine(
    (value) =>
      nonEmpty(value.apiKey) || (nonEmpty(value.username) && nonEmpty(value.password)),
    {
      message: 'Provide an API key or both username and password',
      path: ['apiKey'],
    },
  )

export const tcmTestcaseMappingSchema = z.object({
  testcaseId: idSchema,
  tcmTool: z.enum(tcmTools),
  externalTestcaseId: z.string().min(1),
  syncDirection: z.enum(syncDirections).default('BIDIRECTIONAL'),
})

// Traceability

export const traceabilityDataSchema = z.record(z.unknown())

export const traceabilityMatrixSchema = z.object({
  requirementId: idSchema,
  version: versionSchema,
  status: z.enum(matrixStatuses).default('NOT_STARTED'),
  traceabilityData: traceabilityDataSchema.nullable().optional(),
})

// Billing

/** A limit of `-1` means unlimited. */
export const limitValueSchema = z.number().int().min(-1)

export const planLimitsSchema = z.object({
  uploads: limitValueSchema,
  testcases: limitValueSchema,
  api_calls: limitValueSchema,
})

export const usageIncrementSchema = z.object({
  metric: z.enum(usageMetrics),
  amount: z.number().int().positive().default(1),
})

export type RequirementDetail = z.infer<typeof requirementDetailSchema>
export type CreateRequirementInput = z.input<typeof createRequirementSchema>
export type RequirementRevision = z.input<typeof requirementRevisionSchema>
export type TestcaseStep = z.infer<typeof testcaseStepSchema>
export type CreateTestcaseInput = z.input<typeof createTestcaseSchema>
export type TestcaseRevision = z.input<typeof testcaseRevisionSchema>
export type SectionInput = z.input<typeof sectionSchema>
export type TcmIntegrationInput = z.input<typeof tcmIntegrationSchema>
export type TcmCredentialInput = z.infer<typeof tcmCredentialInputSchema>
export type TcmTestcaseMappingInput = z.input<typeof tcmTestcaseMappingSchema>
export type TraceabilityData = z.infer<typeof traceabilityDataSchema>
export type TraceabilityMatrixInput = z.input<typeof traceabilityMatrixSchema>
export type PlanLimits = z.infer<typeof planLimitsSchema>
export type UsageIncrement = z.input<typeof usageIncrementSchema>
