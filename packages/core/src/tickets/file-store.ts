import { readFile } from 'node:fs/promises'
import { calculateSimilarity, cleanText } from '../knowledge/text'
import { formatZodIssues } from '../errors'
import { type Logger, createLogger } from '../logger'
import {
  type Ticket,
  type TicketProvider,
  TicketRecordSchema,
  type TicketSearchResult,
  toTicket,
} from './types'

/**
 * Weights for free-text ticket search
 */
export const TICKET_SEARCH_WEIGHTS = {
  ID_MATCH: 10,
  TITLE_MATCH: 5,
  DESCRIPTION_MATCH: 2,
  SIMILARITY: 3,
} as const

export function normalizeTicketId(id: string): string {
  return cleanText(id).toUpperCase()
}

/**
 * Tickets kept in a local JSON file (an array of ticket records).
 *
 * The file is read on every call so edits show up without a restart.
 * A missing file holds no tickets.
 */
export class FileTicketStore implements TicketProvider {
  readonly name = 'local'
  private readonly logger: Logger

  constructor(
    private readonly path: string,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger('tickets')
  }

  async getTicket(id: string): Promise<Ticket | null> {
    const wanted = normalizeTicketId(id)
    const tickets = await this.readTickets()
    const ticket = tickets.find((t) => t.id.toUpperCase() === wanted) ?? null

    if (ticket) {
      this.logger.info(`Retrieved ticket ${wanted} from ${this.path}`)
    }
    return ticket
  }

  /**
   * Rank tickets against free text.
   *
   * Verbatim hits in id, title and description add fixed weights; keyword
   * similarity with title and description adds the rest. Tickets scoring
   * zero are left out. Ties keep file order.
   */
  async searchTickets(
    query: string,
    maxResults = 10
  ): Promise<TicketSearchResult[]> {
    const needle = query.trim().toLowerCase()
    if (!needle || maxResults <= 0) return []

    const results: TicketSearchResult[] = []
    for (const ticket of await this.readTickets()) {
      const title = ticket.title.toLowerCase()
      const description = ticket.description.toLowerCase()

      let score = 0
      if (ticket.id.toLowerCase().includes(needle)) {
        score += TICKET_SEARCH_WEIGHTS.ID_MATCH
      }
      if (title.includes(needle)) {
        score += TICKET_SEARCH_WEIGHTS.TITLE_MATCH
      }
      if (description.includes(needle)) {
        score += TICKET_SEARCH_WEIGHTS.DESCRIPTION_MATCH
      }
      score +=
        calculateSimilarity(query, `${title} ${description}`) *
        TICKET_SEARCH_WEIGHTS.SIMILARITY

      if (score > 0) results.push({ ticket, score })
    }

    results.sort((a, b) => b.score - a.score)
    this.logger.debug(
      `Ticket search for '${query}' returned ${results.length} results`
    )
    return results.slice(0, maxResults)
  }

  /**
   * All well-formed tickets in file order. Malformed entries are skipped
   * with a warning.
   *
   * @throws Error when the file exists but is not a JSON array
   */
  async readTickets(): Promise<Ticket[]> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.debug(`Ticket file ${this.path} not found`)
        return []
      }
      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new Error(`Ticket file ${this.path} is not valid JSON`, {
        cause: error,
      })
    }
    if (!Array.isArray(parsed)) {
      throw new Error(`Ticket file ${this.path} must hold a JSON array`)
    }

    const tickets: Ticket[] = []
    parsed.forEach((entry: unknown, position) => {
      const record = TicketRecordSchema.safeParse(entry)
      if (record.success) {
        tickets.push(toTicket(record.data))
      } else {
        this.logger.warn('Skipped malformed ticket', {
          position,
          issues: formatZodIssues(record.error),
        })
      }
    })
    return tickets
  }
}
