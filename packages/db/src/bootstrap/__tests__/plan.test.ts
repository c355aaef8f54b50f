import { describe, expect, it } from 'vitest'
import { SchemaPlanError } from '../../errors'
import { indexDefinitions } from '../indexes'
import { assertDependencyOrder, assertIndexTargets, buildSchemaPlan } from '../plan'
import { renderSeed } from '../seed'
import { tableDefinitions } from '../tables'
import { planPhases } from '../types'

describe('buildSchemaPlan', () => {
  it('creates pgcrypto first by default', () => {
    const [first] = buildSchemaPlan()

    expect(first).toEqual({
      phase: 'extension',
      description: 'Enabled pgcrypto',
      sql: 'CREATE EXTENSION IF NOT EXISTS pgcrypto;',
    })
  })

  it('skips the extension phase when no extensions are requested', () => {
    const plan = buildSchemaPlan({ extensions: [] })

    expect(plan[0].phase).toBe('teardown')
    expect(plan.some((statement) => statement.phase === 'extension')).toBe(false)
  })

  it('keeps phases in build order', () => {
    const order = buildSchemaPlan().map((statement) => planPhases.indexOf(statement.phase))

    expect(order).toEqual([...order].sort((a, b) => a - b))
  })

  it('counts one statement per table, index, trigger, view and seed', () => {
    const plan = buildSchemaPlan({ extensions: [] })
    const count = (phase: string) => plan.filter((statement) => statement.phase === phase).length

    expect(count('teardown')).toBe(19)
    expect(count('table')).toBe(19)
    expect(count('index')).toBe(55)
    expect(count('trigger')).toBe(15)
    expect(count('view')).toBe(1)
    expect(count('seed')).toBe(2)
    expect(plan).toHaveLength(111)
  })

  it('drops children before parents', () => {
    const drops = buildSchemaPlan({ extensions: [] })
      .filter((statement) => statement.phase === 'teardown')
      .map((statement) => statement.sql)

    expect(drops[0]).toBe('DROP TABLE IF EXISTS usage CASCADE;')
    expect(drops[drops.length - 1]).toBe('DROP TABLE IF EXISTS tenants CASCADE;')
  })

  it('creates every table after the tables it references', () => {
    const created = buildSchemaPlan()
      .filter((statement) => statement.phase === 'table')
      .map((statement) => statement.description)

    for (const table of tableDefinitions) {
      const position = created.indexOf(`Created ${table.name} table`)
      for (const parent of table.dependsOn) {
        expect(created.indexOf(`Created ${parent} table`)).toBeLessThan(position)
      }
    }
  })

  it('drops and recreates the TCM cleanup trigger as separate statements', () => {
    const triggers = buildSchemaPlan()
      .filter((statement) => statement.phase === 'trigger')
      .map((statement) => statement.sql)

    expect(triggers[triggers.length - 2]).toBe(
      'DROP TRIGGER IF EXISTS trg_cascade_tcm_mapping_delete ON tcm_testcase_mappings;',
    )
    expect(triggers[triggers.length - 1]).toMatch(/^CREATE TRIGGER trg_cascade_tcm_mapping_delete/)
  })

  it('rejects extension names that are not plain identifiers', () => {
    expect(() => buildSchemaPlan({ extensions: ['pgcrypto; DROP TABLE x'] })).toThrow(
      'Invalid extension name: pgcrypto; DROP TABLE x',
    )
  })
})

describe('assertDependencyOrder', () => {
  it('accepts the shipped table order', () => {
    expect(() => assertDependencyOrder(tableDefinitions)).not.toThrow()
  })

  it('rejects a table created before its parent', () => {
    const tables = [
      { name: 'child', dependsOn: ['parent'], sql: '' },
      { name: 'parent', dependsOn: [], sql: '' },
    ]

    expect(() => assertDependencyOrder(tables)).toThrow(SchemaPlanError)
    expect(() => assertDependencyOrder(tables)).toThrow(
      'Table child references parent, which is not created before it',
    )
  })

  it('rejects a table defined twice', () => {
    const tables = [
      { name: 'parent', dependsOn: [], sql: '' },
      { name: 'parent', dependsOn: [], sql: '' },
    ]

    expect(() => assertDependencyOrder(tables)).toThrow('Table parent is defined twice')
  })
})

describe('assertIndexTargets', () => {
  it('accepts the shipped indexes', () => {
    expect(() => assertIndexTargets(indexDefinitions, tableDefinitions)).not.toThrow()
  })

  it('rejects an index on an unknown table', () => {
    const indexes = [{ name: 'idx_ghost', table: 'ghost', columns: ['id'] }]

    expect(() => assertIndexTargets(indexes, tableDefinitions)).toThrow(
      'Index idx_ghost targets unknown table ghost',
    )
  })
})

describe('renderSeed', () => {
  it('inlines escaped values and ignores existing rows', () => {
    const statement = renderSeed({
      table: 'plans',
      conflictColumn: 'name',
      rows: [{ name: "Founder's", price: 1, is_active: true, description: null }],
    })

    expect(statement).toBe(
      `INSERT INTO "plans" ("name", "price", "is_active", "description") VALUES ('Founder''s', 1, true, null) ON CONFLICT ("name") DO NOTHING;`,
    )
  })

  it('rejects an empty fixture', () => {
    expect(() => renderSeed({ table: 'plans', conflictColumn: 'name', rows: [] })).toThrow(
      'Seed fixture for plans has no rows',
    )
  })
})
