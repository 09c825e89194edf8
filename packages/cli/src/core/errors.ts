import { ConfigError, JiraApiError, ValidationError } from '@deskhand/core'
import type { CommandContext } from './context'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  notFound: 3,
  network: 11,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  debugMessage?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string
  debugMessage?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    debugMessage,
    cause,
  }: CLIErrorOptions) {
    super(debugMessage ?? userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
    this.debugMessage = debugMessage
  }
}

export class UsageError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.usage })
    this.name = 'UsageError'
  }
}

export class NotFoundError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.notFound })
    this.name = 'NotFoundError'
  }
}

export class NetworkError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.network })
    this.name = 'NetworkError'
  }
}

/**
 * Map errors raised by the core onto CLI errors with matching exit codes.
 */
export function toCLIError(
  error: unknown,
  fallbackMessage = 'Command failed.'
): CLIError {
  if (error instanceof CLIError) return error

  if (error instanceof ConfigError) {
    return new UsageError({
      userMessage: error.message,
      suggestion: 'Check the environment variables or your .env file.',
      cause: error,
    })
  }

  if (error instanceof ValidationError) {
    return new UsageError({ userMessage: error.message, cause: error })
  }

  if (error instanceof JiraApiError) {
    return new NetworkError({
      userMessage: `Ticket system request failed (HTTP ${error.status}).`,
      suggestion: 'Verify TICKET_SYSTEM_URL and credentials.',
      debugMessage: error.message,
      cause: error,
    })
  }

  return new CLIError({
    userMessage:
      error instanceof Error && error.message ? error.message : fallbackMessage,
    cause: error,
  })
}

export function formatError(error: unknown): string {
  if (error instanceof CLIError) {
    if (error.suggestion) {
      return `${error.userMessage}\nSuggestion: ${error.suggestion}`
    }

    return error.userMessage
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred.'
  }

  return 'An unexpected error occurred.'
}

/**
 * Report a failed command through the formatter and set the exit code.
 */
export const handleCommandError = (
  ctx: CommandContext,
  error: unknown,
  fallbackMessage?: string
): void => {
  const cliError = toCLIError(error, fallbackMessage)
  ctx.output.error(formatError(cliError))
  if (ctx.verbose && cliError.debugMessage) {
    ctx.output.progress(cliError.debugMessage)
  }
  process.exitCode = cliError.exitCode
}
