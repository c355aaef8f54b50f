import type { SchemaStatement } from './bootstrap/types'

/** Base class for every failure raised while building the schema. */
export class DatabaseBootstrapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The initial connection could not be established. Fatal for the run. */
export class ConnectionError extends DatabaseBootstrapError {}

/** One plan statement failed; carries the statement so callers can report it. */
export class StatementError extends DatabaseBootstrapError {
  readonly statement: SchemaStatement

  constructor(statement: SchemaStatement, cause: unknown) {
    super(`Failed to execute statement: ${statement.description}: ${describeCause(cause)}`, {
      cause,
    })
    this.statement = statement
  }
}

/** The plan itself is inconsistent (e.g. a table created before its parent). */
export class SchemaPlanError extends DatabaseBootstrapError {}

/** Environment configuration did not validate. */
export class ConfigurationError extends DatabaseBootstrapError {}

// -----------------------------------------------------------------------------
// Access layer
// -----------------------------------------------------------------------------

export class NotFoundError extends Error {
  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} not found: ${key}`)
    this.name = 'NotFoundError'
  }
}

/**
 * Another writer inserted the same (id, version) first. The caller may reload
 * the latest version and retry the append.
 */
export class VersionConflictError extends Error {
  constructor(readonly entity: string, readonly id: string, readonly version: number, options?: { cause?: unknown }) {
    super(`${entity} ${id} already has version ${version}`, options)
    this.name = 'VersionConflictError'
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(readonly entity: string, readonly from: string, readonly to: string) {
    super(`${entity} cannot move from ${from} to ${to}`)
    this.name = 'InvalidStatusTransitionError'
  }
}

export class SubscriptionInactiveError extends Error {
  constructor(readonly subscriptionId: number, readonly status: string) {
    super(`Subscription ${subscriptionId} is ${status}`)
    this.name = 'SubscriptionInactiveError'
  }
}

export class UsageLimitExceededError extends Error {
  constructor(
    readonly metric: string,
    readonly used: number,
    readonly limit: number,
    readonly requested: number,
  ) {
    super(`Usage limit for ${metric} exceeded: ${used} + ${requested} > ${limit}`)
    this.name = 'UsageLimitExceededError'
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/** PostgreSQL `unique_violation`, possibly wrapped by the driver. */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  if ('code' in error && error.code === '23505') return true
  return 'cause' in error && error.cause !== error && isUniqueViolation(error.cause)
}
