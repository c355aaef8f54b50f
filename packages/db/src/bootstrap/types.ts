/** Build phases, in execution order. */
export const planPhases = [
  'extension',
  'teardown',
  'table',
  'index',
  'trigger',
  'view',
  'seed',
] as const

export type PlanPhase = (typeof planPhases)[number]

/** One statement of the bootstrap plan, run on its own. */
export type SchemaStatement = {
  phase: PlanPhase
  /** Human-readable progress line, e.g. `Created tenants table`. */
  description: string
  sql: string
}

export type TableDefinition = {
  name: string
  /** Tables this one references; each must be created earlier in the plan. */
  dependsOn: readonly string[]
  sql: string
}

export type IndexDefinition = {
  name: string
  table: string
  columns: readonly string[]
  unique?: boolean
  /** Partial index predicate. */
  where?: string
}
