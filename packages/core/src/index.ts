/**
 * @deskhand/core
 *
 * Core exports for the support engine. Prefer package.json exports
 * for narrower imports: import { SearchEngine } from '@deskhand/core/knowledge'
 */

/** Package version */
export const VERSION = '0.1.0'

export * from './knowledge'
export * from './tickets'
export * from './agent'

// Config
export {
  loadConfig,
  type DeskhandConfig,
  type RuntimeEnv,
  type TicketSystemConfig,
} from './config/env'

// Errors and logging
export { ConfigError, ValidationError, formatZodIssues } from './errors'
export {
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  silentLogger,
  type LogContext,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger'
