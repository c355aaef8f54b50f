import { Pool, type PoolConfig } from 'pg'
import type { DatabaseConfig } from '../config'
import { ConnectionError, describeCause } from '../errors'

/**
 * A single database session that runs plan statements one at a time.
 *
 * The initializer only needs "run this text" and "give the session back", so
 * both the `pg` pool client and the in-process PGlite test database fit.
 */
export type SqlSession = {
  execute(statement: string): Promise<void>
  release(): Promise<void>
}

export type SessionFactory = () => Promise<SqlSession>

export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  if (config.connectionString) {
    return { connectionString: config.connectionString, max: 1 }
  }
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 1,
  }
}

/** Opens one pooled `pg` client; releasing it also ends the pool. */
export function createPgSessionFactory(config: DatabaseConfig): SessionFactory {
  return async () => {
    const pool = new Pool(toPoolConfig(config))
    const connected = await pool.connect().catch(async (error: unknown) => {
      await pool.end()
      throw new ConnectionError(`Could not connect to database: ${describeCause(error)}`, {
        cause: error,
      })
    })
    return {
      async execute(statement) {
        await connected.query(statement)
      },
      async release() {
        connected.release()
        await pool.end()
      },
    }
  }
}
