import { timestamp } from 'drizzle-orm/pg-core'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Last update timestamp; stamped by the `update_updated_at_column()` trigger. */
export const updatedAt = timestamp('updated_at', { withTimezone: true }).defaultNow().notNull()

/**
 * Nullable variants for tables whose DDL declares the timestamps without
 * `NOT NULL` (labels, versioned requirement/testcase rows, link tables).
 */
export const createdAtNullable = timestamp('created_at', { withTimezone: true }).defaultNow()

export const updatedAtNullable = timestamp('updated_at', { withTimezone: true }).defaultNow()

/** TCM catalog mirror freshness marker. */
export const lastSyncedAt = timestamp('last_synced_at', { withTimezone: true }).defaultNow().notNull()

/**
 * Timestamp pair helper.
 *
 * - `strict` (default): both columns `NOT NULL`
 * - `loose`: both columns nullable, matching the older versioned tables
 */
export const withTimestamps = (mode: 'strict' | 'loose' = 'strict') =>
  mode === 'strict'
    ? { createdAt, updatedAt }
    : { createdAt: createdAtNullable, updatedAt: updatedAtNullable }
