// Common utilities
export * from './schema/_common'
export * from './schema/enums'

// Schema exports
export * from './schema/tenants'
export * from './schema/users'
export * from './schema/requirements'
export * from './schema/testcases'
export * from './schema/sections'
export * from './schema/traceability'
export * from './schema/tcm'
export * from './schema/billing'
export * from './schema/views'
export { schema, type Database } from './registry'

// Bootstrap
export * from './bootstrap/types'
export { buildSchemaPlan, assertDependencyOrder, assertIndexTargets, type SchemaPlanOptions } from './bootstrap/plan'
export { tableDefinitions, declaredColumns } from './bootstrap/tables'
export { indexDefinitions, renderIndex } from './bootstrap/indexes'
export { auditedTables } from './bootstrap/routines'
export { seedFixtures, defaultPlans, defaultTenant, renderSeed, type SeedFixture } from './bootstrap/seed'
export {
  createPgSessionFactory,
  toPoolConfig,
  type SessionFactory,
  type SqlSession,
} from './bootstrap/session'
export {
  SchemaInitializer,
  isBootstrapError,
  type InitializeOptions,
  type InitializeReport,
} from './bootstrap/initializer'

// Access layer
export * from './services/requirements'
export * from './services/testcases'
export * from './services/traceability'
export * from './services/tcm'
export * from './services/billing'

// Runtime
export * from './errors'
export * from './logger'
export * from './config'
export { checkSchemaAgreement, type Finding, type GuardInput } from './guard'
