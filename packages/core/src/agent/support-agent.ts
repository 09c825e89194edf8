import { SEARCH_DEFAULTS } from '../knowledge/types'
import type { SearchHit, SearchOptions, SearchResult } from '../knowledge/types'
import { toSearchHit } from '../knowledge/search'
import { extractTicketReference } from '../knowledge/text'
import { type Logger, createLogger } from '../logger'
import type { Ticket, TicketProvider } from '../tickets/types'
import { type ConversationEntry, ConversationHistory } from './history'
import { MAX_QUOTED_ARTICLES, composeResponse } from './respond'

/**
 * Anything that ranks knowledge-base articles for a query
 */
export interface KnowledgeSearch {
  search(query: string, options?: SearchOptions): SearchResult[]
}

export type AgentSource =
  | { type: 'ticket'; id: string; title: string }
  | { type: 'knowledge_base'; id: string; title: string }

export interface AgentResponse {
  response: string
  /** Ticket id detected in the query */
  ticketReference: string | null
  /** The referenced ticket, null when none was referenced or found */
  ticket: Ticket | null
  /** Top knowledge-base hits quoted in the response */
  articles: SearchHit[]
  conversationId: string
  /** ISO timestamp */
  timestamp: string
  sources: AgentSource[]
}

export interface SupportAgentOptions {
  knowledge: KnowledgeSearch
  tickets: TicketProvider
  /** Passed to every knowledge search */
  searchOptions?: SearchOptions
  history?: ConversationHistory
  logger?: Logger
  /** Clock, replaced in tests */
  now?: () => Date
}

/**
 * Answers customer queries from tickets and the knowledge base.
 *
 * @example
 * ```ts
 * const agent = new SupportAgent({
 *   knowledge: new SearchEngine(index),
 *   tickets: new FileTicketStore('data/tickets.json'),
 * })
 * const { response, sources } = await agent.processQuery(
 *   'What is the status of PROJ-1001?'
 * )
 * ```
 */
export class SupportAgent {
  readonly history: ConversationHistory
  private readonly knowledge: KnowledgeSearch
  private readonly tickets: TicketProvider
  private readonly searchOptions: SearchOptions
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(options: SupportAgentOptions) {
    this.knowledge = options.knowledge
    this.tickets = options.tickets
    this.searchOptions = options.searchOptions ?? {}
    this.history = options.history ?? new ConversationHistory()
    this.logger = options.logger ?? createLogger('agent')
    this.now = options.now ?? (() => new Date())
  }

  async processQuery(
    query: string,
    conversationId?: string
  ): Promise<AgentResponse> {
    this.logger.info(`Processing query: ${query.slice(0, 100)}`)

    const startedAt = this.now()
    const id = conversationId || `conv-${startedAt.getTime()}`
    const sources: AgentSource[] = []

    const ticketReference = extractTicketReference(query)
    let ticket: Ticket | null = null
    if (ticketReference) {
      this.logger.info(`Extracted ticket reference: ${ticketReference}`)
      ticket = await this.tickets.getTicket(ticketReference)
      if (ticket) {
        sources.push({ type: 'ticket', id: ticket.id, title: ticket.title })
      } else {
        this.logger.warn(`Ticket ${ticketReference} not found`)
      }
    }

    const results = this.knowledge
      .search(query, this.searchOptions)
      .slice(0, MAX_QUOTED_ARTICLES)
    for (const { article } of results) {
      sources.push({ type: 'knowledge_base', id: article.id, title: article.title })
    }

    const response = composeResponse({
      query,
      ticket,
      articles: results.map((r) => r.article),
      firstTurn: this.history.size === 0,
    })

    const entry: ConversationEntry = {
      timestamp: startedAt.toISOString(),
      conversationId: id,
      query,
      response,
      ticketReference,
    }
    this.history.append(entry)

    return {
      response,
      ticketReference,
      ticket,
      articles: results.map((r) => toSearchHit(r, SEARCH_DEFAULTS.EXCERPT_LENGTH)),
      conversationId: id,
      timestamp: entry.timestamp,
      sources,
    }
  }

  getHistory(conversationId?: string): ConversationEntry[] {
    return this.history.list(conversationId)
  }

  clearHistory(): void {
    this.history.clear()
    this.logger.info('Conversation history cleared')
  }
}
