import { SchemaPlanError } from '../errors'
import { indexDefinitions, renderIndex } from './indexes'
import {
  auditedTables,
  dropTcmMappingCleanupTrigger,
  tcmMappingCleanupFunction,
  tcmMappingCleanupTrigger,
  updatedAtFunction,
  updatedAtTrigger,
} from './routines'
import { renderSeed, seedFixtures } from './seed'
import { tableDefinitions } from './tables'
import type { IndexDefinition, PlanPhase, SchemaStatement, TableDefinition } from './types'
import { requirementSectionsViewDdl } from './views'

export type SchemaPlanOptions = {
  /** Extensions to create before teardown (default: `pgcrypto`). */
  extensions?: readonly string[]
}

const identifierPattern = /^[a-z_][a-z0-9_]*$/

/**
 * Rejects a table order in which some table is created before a table it
 * references.
 */
export function assertDependencyOrder(tables: readonly TableDefinition[]): void {
  const created = new Set<string>()
  for (const table of tables) {
    if (created.has(table.name)) {
      throw new SchemaPlanError(`Table ${table.name} is defined twice`)
    }
    for (const parent of table.dependsOn) {
      if (!created.has(parent)) {
        throw new SchemaPlanError(
          `Table ${table.name} references ${parent}, which is not created before it`,
        )
      }
    }
    created.add(table.name)
  }
}

/** Every index must target a planned table. */
export function assertIndexTargets(
  indexes: readonly IndexDefinition[],
  tables: readonly TableDefinition[],
): void {
  const known = new Set(tables.map((table) => table.name))
  for (const index of indexes) {
    if (!known.has(index.table)) {
      throw new SchemaPlanError(`Index ${index.name} targets unknown table ${index.table}`)
    }
  }
}

function statement(phase: PlanPhase, description: string, sql: string): SchemaStatement {
  return { phase, description, sql: sql.trim() }
}

/**
 * The full bootstrap sequence:
 *
 * 1) extensions
 * 2) teardown (`DROP TABLE IF EXISTS ... CASCADE`, children first)
 * 3) tables in dependency order
 * 4) indexes
 * 5) trigger functions + triggers
 * 6) views
 * 7) seed fixtures
 *
 * Re-running the plan rebuilds an identical schema.
 */
export function buildSchemaPlan(options: SchemaPlanOptions = {}): SchemaStatement[] {
  const extensions = options.extensions ?? ['pgcrypto']
  for (const extension of extensions) {
    if (!identifierPattern.test(extension)) {
      throw new SchemaPlanError(`Invalid extension name: ${extension}`)
    }
  }

  assertDependencyOrder(tableDefinitions)
  assertIndexTargets(indexDefinitions, tableDefinitions)

  const plan: SchemaStatement[] = []

  for (const extension of extensions) {
    plan.push(
      statement('extension', `Enabled ${extension}`, `CREATE EXTENSION IF NOT EXISTS ${extension};`),
    )
  }

  for (const table of [...tableDefinitions].reverse()) {
    plan.push(
      statement('teardown', `Dropped ${table.name}`, `DROP TABLE IF EXISTS ${table.name} CASCADE;`),
    )
  }

  for (const table of tableDefinitions) {
    plan.push(statement('table', `Created ${table.name} table`, table.sql))
  }

  for (const index of indexDefinitions) {
    const kind = index.unique ? 'unique index' : 'index'
    plan.push(statement('index', `Created ${kind} ${index.name}`, renderIndex(index)))
  }

  plan.push(statement('trigger', 'Created trigger function', updatedAtFunction))
  for (const table of auditedTables) {
    plan.push(statement('trigger', `Created trigger for ${table}`, updatedAtTrigger(table)))
  }
  plan.push(
    statement(
      'trigger',
      'Created cascade function for TCM mapping deletes',
      tcmMappingCleanupFunction,
    ),
    statement(
      'trigger',
      'Dropped stale TCM mapping delete trigger',
      dropTcmMappingCleanupTrigger,
    ),
    statement(
      'trigger',
      'Created trigger for cascading TCM mapping deletes',
      tcmMappingCleanupTrigger,
    ),
  )

  plan.push(statement('view', 'Created view requirement_sections_v', requirementSectionsViewDdl))

  for (const fixture of seedFixtures) {
    plan.push(statement('seed', `Seeded default ${fixture.table}`, renderSeed(fixture)))
  }

  return plan
}
