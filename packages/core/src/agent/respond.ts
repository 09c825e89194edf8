import type { Article } from '../knowledge/types'
import type { Ticket } from '../tickets/types'
import { renderTemplate } from './templates'

/** Articles quoted in a response */
export const MAX_QUOTED_ARTICLES = 3
/** Characters of article content quoted */
export const ARTICLE_QUOTE_LENGTH = 300
/** Characters of a comment, update or description quoted */
export const SNIPPET_LENGTH = 200
/** Most recent comments listed under a ticket */
export const RECENT_COMMENTS = 2

export interface ResponseInput {
  query: string
  ticket: Ticket | null
  /** Ranked, best first */
  articles: readonly Article[]
  /** Adds the greeting */
  firstTurn: boolean
}

const orNA = (value: string) => value || 'N/A'

function ticketSection(ticket: Ticket): string[] {
  const lines = [
    renderTemplate('ticketHeading'),
    renderTemplate('ticketId', { id: orNA(ticket.id) }),
    renderTemplate('ticketTitle', { title: orNA(ticket.title) }),
    renderTemplate('ticketStatus', { status: orNA(ticket.status) }),
    renderTemplate('ticketPriority', { priority: orNA(ticket.priority) }),
  ]

  if (ticket.description) {
    lines.push(
      renderTemplate('ticketDescription', { description: ticket.description })
    )
  }

  if (ticket.comments.length > 0) {
    lines.push(renderTemplate('updatesHeading'))
    for (const comment of ticket.comments.slice(-RECENT_COMMENTS)) {
      lines.push(
        renderTemplate('update', {
          author: orNA(comment.author),
          body: comment.body.slice(0, SNIPPET_LENGTH),
        })
      )
    }
  }

  lines.push('')
  return lines
}

function articleSection(articles: readonly Article[]): string[] {
  const lines = [renderTemplate('articlesHeading')]

  articles.slice(0, MAX_QUOTED_ARTICLES).forEach((article, i) => {
    lines.push(
      renderTemplate('article', {
        position: String(i + 1),
        title: article.title,
        category: article.category,
      }),
      renderTemplate('articleContent', {
        content: article.content.slice(0, ARTICLE_QUOTE_LENGTH),
      })
    )
    if (article.content.length > ARTICLE_QUOTE_LENGTH) {
      lines.push(renderTemplate('articleCut'))
    }
  })

  lines.push('')
  return lines
}

/**
 * Pick the line that speaks to the query directly.
 *
 * Rules are tried in order: status and progress questions about a known
 * ticket, resolve/fix requests, error/issue reports about a known ticket,
 * then a generic pointer when articles were found. Returns '' when no
 * rule applies.
 */
export function contextualLine(
  query: string,
  ticket: Ticket | null,
  articles: readonly Article[]
): string {
  const q = query.toLowerCase()

  if (ticket && q.includes('status')) {
    return renderTemplate('status', { status: ticket.status || 'Unknown' })
  }

  const latest = ticket?.comments.at(-1)
  if (ticket && q.includes('progress') && latest) {
    return renderTemplate('progress', {
      update: latest.body.slice(0, SNIPPET_LENGTH),
    })
  }

  if (q.includes('resolve') || q.includes('fix')) {
    const top = articles[0]
    return top
      ? renderTemplate('solution', {
          solution: top.content.slice(0, SNIPPET_LENGTH),
        })
      : renderTemplate('noSolution')
  }

  if (ticket && (q.includes('error') || q.includes('issue'))) {
    return renderTemplate('issue', {
      description: ticket.description.slice(0, SNIPPET_LENGTH),
    })
  }

  return articles.length > 0 ? renderTemplate('generic') : ''
}

/**
 * Compose the agent's answer as markdown-flavoured text.
 *
 * @example
 * ```ts
 * composeResponse({ query: 'hi', ticket: null, articles: [], firstTurn: false })
 * // => "I couldn't find specific information ...\n\n---\nIs there anything else I can help you with?"
 * ```
 */
export function composeResponse(input: ResponseInput): string {
  const { query, ticket, articles, firstTurn } = input
  const parts: string[] = []

  if (firstTurn) {
    parts.push(renderTemplate('greeting'), '')
  }
  if (ticket) {
    parts.push(...ticketSection(ticket))
  }
  if (articles.length > 0) {
    parts.push(...articleSection(articles))
  }

  const context = contextualLine(query, ticket, articles)
  if (context) {
    parts.push(renderTemplate('contextHeading'), context)
  }

  if (!ticket && articles.length === 0) {
    parts.push(renderTemplate('fallback'))
  }

  parts.push(renderTemplate('separator'), renderTemplate('closing'))
  return parts.join('\n')
}
