import type { ZodError } from 'zod'

/**
 * Raised when input handed to the core is structurally invalid
 * (an article without a title, a negative result cap, ...).
 *
 * Absence is never an error: lookups return `null` and searches `[]`.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ValidationError'
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(message, formatZodIssues(error))
  }
}

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  )
}

/**
 * Raised when environment configuration cannot be parsed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigError'
  }
}
