export const logLevels = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof logLevels)[number]

export type Logger = {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

type LogSink = Pick<Console, 'log' | 'error'>

function timestamp() {
  return new Date().toISOString().split('T')[1].split('.')[0]
}

/**
 * Console logger with `[HH:MM:SS] message` lines.
 *
 * `debug` is reserved for statement text so normal runs stay readable.
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const threshold = logLevels.indexOf(level)
  const enabled = (candidate: LogLevel) => logLevels.indexOf(candidate) >= threshold

  return {
    debug(message) {
      if (enabled('debug')) sink.log(`[${timestamp()}] ${message}`)
    },
    info(message) {
      if (enabled('info')) sink.log(`[${timestamp()}] ${message}`)
    },
    warn(message) {
      if (enabled('warn')) sink.log(`[${timestamp()}] WARN ${message}`)
    },
    error(message) {
      if (enabled('error')) sink.error(`[${timestamp()}] ERROR ${message}`)
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
