/**
 * Closed vocabularies shared by the DDL check constraints, the drizzle
 * column types and the zod input schemas.
 *
 * Values are part of the stored contract: add new ones only together with the
 * matching CHECK constraint change, never rename.
 */

// -----------------------------------------------------------------------------
// Tenant + identity
// -----------------------------------------------------------------------------

export const tenantTypes = ['PERSONAL', 'ORGANIZATION'] as const

export const tenantStates = ['ACTIVE', 'PENDING'] as const

export const userStates = ['ACTIVE', 'PENDING'] as const

export const authProviders = ['GOOGLE', 'LINKEDIN', 'LDAP', 'SAML', 'LOCAL', 'EMBEDDED'] as const

// -----------------------------------------------------------------------------
// Requirement + testcase lifecycle
// -----------------------------------------------------------------------------

/** Downstream testcase generation progress for one requirement version. */
export const generationStatuses = [
  'NOT_STARTED',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
  'SYNCHED',
] as const

/** Synchronization state of one testcase version against external TCM tools. */
export const syncStatuses = ['NEW', 'UPDATED', 'SYNCHED'] as const

export const priorities = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const

export const matrixStatuses = ['NOT_STARTED', 'IN_PROGRESS', 'COMPLETED', 'FAILED'] as const

// -----------------------------------------------------------------------------
// TCM integrations
// -----------------------------------------------------------------------------

export const tcmTools = ['testrail', 'zephyr', 'xray'] as const

/** Section origin: created here (`internal`) or mirrored from one TCM tool. */
export const sectionSources = ['internal', ...tcmTools] as const

export const syncDirections = ['PUSH', 'PULL', 'BIDIRECTIONAL'] as const

// -----------------------------------------------------------------------------
// Billing
// -----------------------------------------------------------------------------

export const subscriptionStatuses = ['ACTIVE', 'SUSPENDED', 'CANCELLED', 'EXPIRED'] as const

export const usageMetrics = ['uploads', 'testcases', 'api_calls'] as const

/** Billing period; also the usage counter reset cadence. */
export const planDurations = ['monthly', 'yearly', 'lifetime'] as const

export type TenantType = (typeof tenantTypes)[number]
export type TenantState = (typeof tenantStates)[number]
export type UserState = (typeof userStates)[number]
export type AuthProvider = (typeof authProviders)[number]
export type GenerationStatus = (typeof generationStatuses)[number]
export type SyncStatus = (typeof syncStatuses)[number]
export type Priority = (typeof priorities)[number]
export type MatrixStatus = (typeof matrixStatuses)[number]
export type TcmTool = (typeof tcmTools)[number]
export type SectionSource = (typeof sectionSources)[number]
export type SyncDirection = (typeof syncDirections)[number]
export type SubscriptionStatus = (typeof subscriptionStatuses)[number]
export type UsageMetric = (typeof usageMetrics)[number]
export type PlanDuration = (typeof planDurations)[number]
