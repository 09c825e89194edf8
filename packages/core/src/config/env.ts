import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'
import { ConfigError, formatZodIssues } from '../errors'
import { LOG_LEVELS, type LogLevel } from '../logger'

/**
 * Connection settings for the remote ticket system. Credentials are
 * optional here; a client is only built when both are present.
 */
export interface TicketSystemConfig {
  baseUrl: string
  username?: string
  apiToken?: string
}

export interface DeskhandConfig {
  /** Directory of `*.json` article files */
  knowledgeBasePath: string
  /** Local ticket store (JSON array) */
  ticketsFile: string
  /** Remote ticket system, null when TICKET_SYSTEM_URL is unset */
  ticketSystem: TicketSystemConfig | null
  search: {
    maxResults: number
    minScore: number
  }
  logLevel: LogLevel
}

export type RuntimeEnv = Record<string, string | undefined>

/**
 * Read configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 *
 * @example
 * ```ts
 * const config = loadConfig({ MAX_SEARCH_RESULTS: '3' })
 * config.search // => { maxResults: 3, minScore: 0.1 }
 * ```
 */
export function loadConfig(runtimeEnv: RuntimeEnv = process.env): DeskhandConfig {
  const env = createEnv({
    server: {
      KNOWLEDGE_BASE_PATH: z.string().default('data/knowledge-base'),
      TICKETS_FILE: z.string().default('data/tickets.json'),
      TICKET_SYSTEM_URL: z.string().url().optional(),
      TICKET_SYSTEM_USERNAME: z.string().optional(),
      TICKET_SYSTEM_API_TOKEN: z.string().optional(),
      MAX_SEARCH_RESULTS: z.coerce.number().int().positive().default(5),
      MIN_RELEVANCE_SCORE: z.coerce.number().nonnegative().default(0.1),
      LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (error) => {
      throw new ConfigError('Invalid environment configuration', formatZodIssues(error))
    },
  })

  return {
    knowledgeBasePath: env.KNOWLEDGE_BASE_PATH,
    ticketsFile: env.TICKETS_FILE,
    ticketSystem: env.TICKET_SYSTEM_URL
      ? {
          baseUrl: env.TICKET_SYSTEM_URL.replace(/\/+$/, ''),
          username: env.TICKET_SYSTEM_USERNAME,
          apiToken: env.TICKET_SYSTEM_API_TOKEN,
        }
      : null,
    search: {
      maxResults: env.MAX_SEARCH_RESULTS,
      minScore: env.MIN_RELEVANCE_SCORE,
    },
    logLevel: env.LOG_LEVEL,
  }
}
