import { describe, expect, it, vi } from 'vitest'
import { ConnectionError, StatementError } from '../../errors'
import { createLogger } from '../../logger'
import { SchemaInitializer } from '../initializer'
import type { SqlSession } from '../session'

function recordingSession(failWhen: (statement: string) => boolean = () => false) {
  const executed: string[] = []
  const release = vi.fn(async () => {})
  const session: SqlSession = {
    async execute(statement) {
      if (failWhen(statement)) throw new Error('boom')
      executed.push(statement)
    },
    release,
  }
  return { session, executed, release }
}

const failsOnRequirements = (statement: string) => statement.startsWith('CREATE TABLE requirements ')

describe('SchemaInitializer', () => {
  it('runs every statement in plan order and releases the session', async () => {
    const { session, executed, release } = recordingSession()
    const initializer = new SchemaInitializer(async () => session, { extensions: [] })

    const report = await initializer.initialize()

    expect(executed).toEqual(initializer.statements.map((statement) => statement.sql))
    expect(release).toHaveBeenCalledTimes(1)
    expect(report.statements).toBe(111)
    expect(report.phases).toEqual({
      extension: 0,
      teardown: 19,
      table: 19,
      index: 55,
      trigger: 15,
      view: 1,
      seed: 2,
    })
  })

  it('stops at the first failing statement', async () => {
    const { session, executed, release } = recordingSession(failsOnRequirements)
    const initializer = new SchemaInitializer(async () => session, { extensions: [] })
    const failedAt = initializer.statements.findIndex((statement) =>
      failsOnRequirements(statement.sql),
    )

    const error = await initializer.initialize().catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(StatementError)
    if (!(error instanceof StatementError)) return
    expect(error.message).toBe('Failed to execute statement: Created requirements table: boom')
    expect(error.statement.phase).toBe('table')
    expect(executed).toHaveLength(failedAt)
    expect(release).toHaveBeenCalledTimes(1)
  })

  it('wraps the plan in a transaction in atomic mode', async () => {
    const { session, executed } = recordingSession()
    const initializer = new SchemaInitializer(async () => session, {
      extensions: [],
      atomic: true,
    })

    await initializer.initialize()

    expect(executed[0]).toBe('BEGIN;')
    expect(executed[executed.length - 1]).toBe('COMMIT;')
    expect(executed).toHaveLength(113)
  })

  it('rolls back in atomic mode when a statement fails', async () => {
    const { session, executed, release } = recordingSession(failsOnRequirements)
    const initializer = new SchemaInitializer(async () => session, {
      extensions: [],
      atomic: true,
    })

    await expect(initializer.initialize()).rejects.toBeInstanceOf(StatementError)

    expect(executed[0]).toBe('BEGIN;')
    expect(executed[executed.length - 1]).toBe('ROLLBACK;')
    expect(executed).not.toContain('COMMIT;')
    expect(release).toHaveBeenCalledTimes(1)
  })

  it('surfaces connection failures without running anything', async () => {
    const failure = new ConnectionError('Could not connect to database: refused')
    const initializer = new SchemaInitializer(async () => {
      throw failure
    })

    await expect(initializer.initialize()).rejects.toBe(failure)
  })

  it('logs each step and the failing SQL', async () => {
    const sink = { log: vi.fn(), error: vi.fn() }
    const { session } = recordingSession(failsOnRequirements)
    const initializer = new SchemaInitializer(async () => session, {
      extensions: [],
      logger: createLogger('info', sink),
    })

    await expect(initializer.initialize()).rejects.toBeInstanceOf(StatementError)

    const infoLines = sink.log.mock.calls.map(([line]) => String(line))
    const errorLines = sink.error.mock.calls.map(([line]) => String(line))
    expect(infoLines).toContainEqual(expect.stringMatching(/^\[\d{2}:\d{2}:\d{2}\] Created tenants table$/))
    expect(infoLines[infoLines.length - 1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] Database connection closed$/)
    expect(errorLines[0]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\] ERROR Created requirements table failed: boom$/,
    )
    expect(errorLines[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] ERROR SQL: CREATE TABLE requirements \(/)
  })

  it('reports the failing statement when releasing the session also fails', async () => {
    const sink = { log: vi.fn(), error: vi.fn() }
    const { session } = recordingSession(failsOnRequirements)
    session.release = async () => {
      throw new Error('socket closed')
    }
    const initializer = new SchemaInitializer(async () => session, {
      extensions: [],
      logger: createLogger('info', sink),
    })

    await expect(initializer.initialize()).rejects.toBeInstanceOf(StatementError)

    const errorLines = sink.error.mock.calls.map(([line]) => String(line))
    expect(errorLines[errorLines.length - 1]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\] ERROR Closing the database connection failed: socket closed$/,
    )
  })

  it('keeps statement text out of info logs', async () => {
    const sink = { log: vi.fn(), error: vi.fn() }
    const { session } = recordingSession()
    const initializer = new SchemaInitializer(async () => session, {
      extensions: [],
      logger: createLogger('info', sink),
    })

    await initializer.initialize()

    const lines = sink.log.mock.calls.map(([line]) => String(line))
    expect(lines.some((line) => line.includes('CREATE TABLE'))).toBe(false)
  })
})
