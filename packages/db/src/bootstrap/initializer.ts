import { DatabaseBootstrapError, StatementError, describeCause } from '../errors'
import { silentLogger, type Logger } from '../logger'
import { buildSchemaPlan } from './plan'
import type { SessionFactory, SqlSession } from './session'
import type { PlanPhase, SchemaStatement } from './types'

export type InitializeOptions = {
  extensions?: readonly string[]
  /** Run the whole plan inside BEGIN/COMMIT; rolls back on the first failure. */
  atomic?: boolean
  logger?: Logger
}

export type InitializeReport = {
  statements: number
  phases: Record<PlanPhase, number>
  elapsedMs: number
}

function countPhases(plan: readonly SchemaStatement[]): Record<PlanPhase, number> {
  const phases: Record<PlanPhase, number> = {
    extension: 0,
    teardown: 0,
    table: 0,
    index: 0,
    trigger: 0,
    view: 0,
    seed: 0,
  }
  for (const statement of plan) phases[statement.phase] += 1
  return phases
}

/**
 * Drops and rebuilds the whole schema over one session.
 *
 * Statements run strictly in plan order. The first failure stops the run
 * with a {@link StatementError}; the session is released on every exit path.
 */
export class SchemaInitializer {
  private readonly logger: Logger
  private readonly plan: SchemaStatement[]
  private readonly atomic: boolean

  constructor(
    private readonly openSession: SessionFactory,
    options: InitializeOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger
    this.atomic = options.atomic ?? false
    this.plan = buildSchemaPlan(
      options.extensions ? { extensions: options.extensions } : {},
    )
  }

  get statements(): readonly SchemaStatement[] {
    return this.plan
  }

  async initialize(): Promise<InitializeReport> {
    const startedAt = Date.now()
    const session = await this.openSession()
    this.logger.info('Connected to database')

    try {
      if (this.atomic) {
        await session.execute('BEGIN;')
        this.logger.debug('Opened transaction')
      }

      await this.runPlan(session)

      if (this.atomic) {
        await session.execute('COMMIT;')
        this.logger.debug('Committed transaction')
      }
    } catch (error) {
      if (this.atomic) await this.rollback(session)
      throw error
    } finally {
      await this.release(session)
    }

    const report: InitializeReport = {
      statements: this.plan.length,
      phases: countPhases(this.plan),
      elapsedMs: Date.now() - startedAt,
    }
    this.logger.info(
      `Database initialization completed successfully (${report.statements} statements, ${report.elapsedMs}ms)`,
    )
    return report
  }

  private async runPlan(session: SqlSession) {
    let phase: PlanPhase | undefined
    for (const statement of this.plan) {
      if (statement.phase !== phase) {
        phase = statement.phase
        this.logger.debug(`Phase: ${phase}`)
      }
      this.logger.debug(statement.sql)
      try {
        await session.execute(statement.sql)
      } catch (error) {
        this.logger.error(`${statement.description} failed: ${describeCause(error)}`)
        this.logger.error(`SQL: ${statement.sql}`)
        throw new StatementError(statement, error)
      }
      this.logger.info(statement.description)
    }
  }

  private async release(session: SqlSession) {
    try {
      await session.release()
      this.logger.info('Database connection closed')
    } catch (error) {
      this.logger.error(`Closing the database connection failed: ${describeCause(error)}`)
    }
  }

  private async rollback(session: SqlSession) {
    try {
      await session.execute('ROLLBACK;')
      this.logger.warn('Rolled back transaction')
    } catch (error) {
      this.logger.error(`Rollback failed: ${describeCause(error)}`)
    }
  }
}

export function isBootstrapError(error: unknown): error is DatabaseBootstrapError {
  return error instanceof DatabaseBootstrapError
}
