/**
 * Value vocabularies used by the typed columns.
 *
 * The schema stores these as `TEXT`/`VARCHAR` with `CHECK (... IN (...))`
 * constraints rather than PostgreSQL enum types, so the drizzle columns use
 * `text(name, { enum })` for typing only. The tuples themselves live in
 * `@traceforge/schema` so the zod inputs and the DDL render from one source.
 */
export {
  authProviders,
  generationStatuses,
  matrixStatuses,
  planDurations,
  sectionSources,
  subscriptionStatuses,
  syncDirections,
  syncStatuses,
  tcmTools,
  tenantStates,
  tenantTypes,
  usageMetrics,
  userStates,
} from "@traceforge/schema";

export type {
  AuthProvider,
  GenerationStatus,
  MatrixStatus,
  PlanDuration,
  SectionSource,
  SubscriptionStatus,
  SyncDirection,
  SyncStatus,
  TcmTool,
  TenantState,
  TenantType,
  UsageMetric,
  UserState,
} from "@traceforge/schema";
