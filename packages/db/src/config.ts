import { z } from 'zod'
import { ConfigurationError } from './errors'
import { logLevels, type LogLevel } from './logger'

export type DatabaseConfig = {
  host: string
  port: number
  database: string
  user: string
  password: string
  /** When set, used instead of the discrete connection fields. */
  connectionString?: string
}

export type BootstrapOptions = {
  /** Wrap the whole plan in one transaction instead of auto-commit. */
  atomic: boolean
  /** Extensions created before teardown; empty when `gen_random_uuid()` is in core. */
  extensions: string[]
}

export type AppConfig = {
  database: DatabaseConfig
  bootstrap: BootstrapOptions
  logLevel: LogLevel
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

const list = z
  .string()
  .default('pgcrypto')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean),
  )

const envSchema = z.object({
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().max(65535).default(5432),
  DB_NAME: z.string().min(1).default('testcase_db'),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default('password'),
  DATABASE_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional(),
  ),
  DB_INIT_ATOMIC: flag,
  DB_EXTENSIONS: list,
  LOG_LEVEL: z.enum(logLevels).default('info'),
})

/**
 * Reads configuration once from the environment.
 *
 * Every field has a local-development default, so an empty environment
 * targets `postgres:password@localhost:5432/testcase_db`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${issues}`)
  }

  const values = parsed.data
  return {
    database: {
      host: values.DB_HOST,
      port: values.DB_PORT,
      database: values.DB_NAME,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
      ...(values.DATABASE_URL ? { connectionString: values.DATABASE_URL } : {}),
    },
    bootstrap: {
      atomic: values.DB_INIT_ATOMIC,
      extensions: values.DB_EXTENSIONS,
    },
    logLevel: values.LOG_LEVEL,
  }
}

/** Connection target without the password, for log lines. */
export function describeTarget(config: DatabaseConfig): string {
  if (config.connectionString) {
    const url = new URL(config.connectionString)
    return `${url.hostname}:${url.port || '5432'}${url.pathname}`
  }
  return `${config.host}:${config.port}/${config.database}`
}
