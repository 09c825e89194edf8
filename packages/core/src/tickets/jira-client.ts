import { z } from 'zod'
import { formatZodIssues } from '../errors'
import { type Logger, createLogger } from '../logger'
import type { Ticket, TicketProvider } from './types'

/**
 * Configuration for the Jira-style ticket API client
 */
export interface JiraClientConfig {
  /** Base URL, e.g. https://tickets.example.com */
  baseUrl: string
  username: string
  /** API token used as the Basic auth password */
  apiToken: string
  /** Attempts per request when rate limited (default 3) */
  maxRetries?: number
  logger?: Logger
  /** Delay implementation, replaced in tests */
  sleep?: (ms: number) => Promise<void>
}

/**
 * Error raised for any failed ticket API call other than 404
 */
export class JiraApiError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message)
    this.name = 'JiraApiError'
  }
}

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '')

const field = z
  .object({ name: text })
  .nullish()
  .transform((value) => value?.name ?? '')

const user = z
  .object({ displayName: text })
  .nullish()
  .transform((value) => value?.displayName ?? '')

/**
 * Subset of the issue payload returned by `GET /rest/api/2/issue/{key}`
 */
export const JiraIssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: text,
    description: text,
    status: field,
    priority: field,
    assignee: user,
    reporter: user,
    created: text,
    updated: text,
    comment: z
      .object({
        comments: z.array(
          z.object({
            author: user,
            body: text,
            created: text,
          })
        ),
      })
      .nullish(),
  }),
})

export type JiraIssue = z.infer<typeof JiraIssueSchema>

export function toTicketFromJira(issue: JiraIssue): Ticket {
  const { fields } = issue
  return {
    id: issue.key,
    title: fields.summary,
    description: fields.description,
    status: fields.status,
    priority: fields.priority,
    assignee: fields.assignee,
    reporter: fields.reporter,
    createdAt: fields.created,
    updatedAt: fields.updated,
    comments: (fields.comment?.comments ?? []).map((comment) => ({
      author: comment.author,
      body: comment.body,
      createdAt: comment.created,
    })),
  }
}

/**
 * Delay before retrying a 429. Uses Retry-After when present, otherwise
 * exponential backoff capped at 30s.
 */
export function retryDelay(response: Response, attempt: number): number {
  const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10)
  if (Number.isFinite(retryAfter) && retryAfter >= 0) {
    return retryAfter * 1000
  }
  return Math.min(1000 * 2 ** attempt, 30000)
}

/**
 * Create a ticket provider backed by a Jira-style REST API.
 *
 * @example
 * ```ts
 * const jira = createJiraClient({
 *   baseUrl: 'https://tickets.example.com',
 *   username: 'support-bot',
 *   apiToken: process.env.TICKET_SYSTEM_API_TOKEN ?? '',
 * })
 * const ticket = await jira.getTicket('PROJ-1001')
 * ```
 */
export function createJiraClient(config: JiraClientConfig): TicketProvider {
  const baseUrl = config.baseUrl.replace(/\/+$/, '')
  const maxRetries = config.maxRetries ?? 3
  const logger = config.logger ?? createLogger('jira')
  const sleep =
    config.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)))
  const headers = {
    Authorization: `Basic ${Buffer.from(`${config.username}:${config.apiToken}`).toString('base64')}`,
    Accept: 'application/json',
  }

  async function getTicket(id: string): Promise<Ticket | null> {
    const url = `${baseUrl}/rest/api/2/issue/${encodeURIComponent(id)}`

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const response = await fetch(url, { method: 'GET', headers })

      if (response.status === 429) {
        if (attempt === maxRetries - 1) break
        const delay = retryDelay(response, attempt)
        logger.warn(`Rate limited fetching ${id}, retrying in ${delay}ms`)
        await sleep(delay)
        continue
      }

      if (response.status === 404) {
        return null
      }

      if (!response.ok) {
        throw new JiraApiError(
          response.status,
          `Ticket request for ${id} failed with status ${response.status} ${response.statusText}`.trim()
        )
      }

      const parsed = JiraIssueSchema.safeParse(await response.json())
      if (!parsed.success) {
        throw new JiraApiError(
          response.status,
          `Unexpected ticket payload for ${id}: ${formatZodIssues(parsed.error).join('; ')}`
        )
      }

      logger.info(`Retrieved ticket ${id} from API`)
      return toTicketFromJira(parsed.data)
    }

    throw new JiraApiError(429, 'Rate limited: max retries exceeded')
  }

  return { name: 'jira', getTicket }
}
