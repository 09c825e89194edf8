/**
 * Scoped console logging.
 *
 * Lines are written as `[scope] message` so output from the knowledge
 * index, ticket stores and the agent can be told apart in one stream.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

/**
 * Where formatted lines go instead of the console (e.g. `process.stderr`)
 */
export interface LogSink {
  write(chunk: string): unknown
}

export interface LoggerOptions {
  /** Fixed level. When omitted, LOG_LEVEL is read on every call. */
  level?: LogLevel
  sink?: LogSink
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' &&
    (LOG_LEVELS as readonly string[]).includes(value)
  )
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

/**
 * Create a logger that prefixes every line with its scope.
 *
 * @example
 * ```ts
 * const log = createLogger('knowledge')
 * log.warn('Skipped malformed article', { position: 3 })
 * // [knowledge] Skipped malformed article { position: 3 }
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_RANK[level] >= LEVEL_RANK[resolveLevel(options)]

  const write =
    (level: Exclude<LogLevel, 'silent'>, fallback: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext): void => {
      if (!enabled(level)) return
      const line = `[${scope}] ${message}`
      const hasContext = context !== undefined && Object.keys(context).length > 0

      if (options.sink) {
        options.sink.write(
          hasContext ? `${line} ${JSON.stringify(context)}\n` : `${line}\n`
        )
      } else if (hasContext) {
        fallback(line, context)
      } else {
        fallback(line)
      }
    }

  return {
    debug: write('debug', console.debug),
    info: write('info', console.info),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
