import { getTableName } from 'drizzle-orm'
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core'
import { indexDefinitions } from './bootstrap/indexes'
import { auditedTables } from './bootstrap/routines'
import { declaredColumns, tableDefinitions } from './bootstrap/tables'
import type { IndexDefinition, TableDefinition } from './bootstrap/types'
import { schema } from './registry'

export type Finding = {
  level: 'error' | 'warn'
  rule: string
  table: string
  detail: string
}

export type GuardInput = {
  typed: readonly PgTable[]
  definitions: readonly TableDefinition[]
  indexes: readonly IndexDefinition[]
  audited: readonly string[]
}

const defaultInput: GuardInput = {
  typed: Object.values(schema),
  definitions: tableDefinitions,
  indexes: indexDefinitions,
  audited: auditedTables,
}

function difference(left: Iterable<string>, right: ReadonlySet<string>): string[] {
  return [...left].filter((item) => !right.has(item)).sort()
}

/**
 * Compares the drizzle tables with the DDL the plan executes.
 *
 * Rules:
 * - every typed table has a CREATE TABLE with the same column set
 * - every CREATE TABLE has a typed table
 * - typed indexes exist in the plan under the same table
 * - typed foreign keys point at a table listed in `dependsOn`
 * - audited tables carry `updated_at`
 * - plan indexes target planned tables
 */
export function checkSchemaAgreement(input: GuardInput = defaultInput): Finding[] {
  const findings: Finding[] = []
  const definitions = new Map(input.definitions.map((definition) => [definition.name, definition]))
  const typedNames = new Set<string>()

  for (const table of input.typed) {
    const config = getTableConfig(table)
    typedNames.add(config.name)
    const definition = definitions.get(config.name)

    if (!definition) {
      findings.push({
        level: 'error',
        rule: 'table-missing-from-plan',
        table: config.name,
        detail: `Typed table "${config.name}" has no CREATE TABLE in the plan.`,
      })
      continue
    }

    const typedColumns = new Set(config.columns.map((column) => column.name))
    const ddlColumns = new Set(declaredColumns(definition))
    for (const column of difference(typedColumns, ddlColumns)) {
      findings.push({
        level: 'error',
        rule: 'column-missing-from-ddl',
        table: config.name,
        detail: `Column "${column}" is typed but not created.`,
      })
    }
    for (const column of difference(ddlColumns, typedColumns)) {
      findings.push({
        level: 'error',
        rule: 'column-missing-from-type',
        table: config.name,
        detail: `Column "${column}" is created but not typed.`,
      })
    }

    const plannedIndexes = new Set(
      input.indexes.filter((index) => index.table === config.name).map((index) => index.name),
    )
    for (const index of config.indexes) {
      const name = index.config.name
      if (name && !plannedIndexes.has(name)) {
        findings.push({
          level: 'warn',
          rule: 'index-missing-from-plan',
          table: config.name,
          detail: `Typed index "${name}" is not created by the plan.`,
        })
      }
    }

    for (const foreignKey of config.foreignKeys) {
      const parent = getTableName(foreignKey.reference().foreignTable)
      if (parent === config.name) continue
      if (!definition.dependsOn.includes(parent)) {
        findings.push({
          level: 'error',
          rule: 'foreign-key-undeclared',
          table: config.name,
          detail: `References "${parent}" but does not list it in dependsOn.`,
        })
      }
    }
  }

  for (const definition of input.definitions) {
    if (!typedNames.has(definition.name)) {
      findings.push({
        level: 'warn',
        rule: 'table-untyped',
        table: definition.name,
        detail: `CREATE TABLE "${definition.name}" has no typed table.`,
      })
    }
  }

  for (const table of input.audited) {
    const definition = definitions.get(table)
    if (!definition || !declaredColumns(definition).includes('updated_at')) {
      findings.push({
        level: 'error',
        rule: 'audited-table-without-updated-at',
        table,
        detail: `Table "${table}" gets the updated_at trigger but has no updated_at column.`,
      })
    }
  }

  for (const index of input.indexes) {
    if (!definitions.has(index.table)) {
      findings.push({
        level: 'error',
        rule: 'index-targets-unknown-table',
        table: index.table,
        detail: `Index "${index.name}" targets a table the plan never creates.`,
      })
    }
  }

  return findings
}
