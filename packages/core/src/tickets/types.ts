/**
 * Ticket module types
 *
 * Tickets come from a system of record (a local JSON file or a Jira-style
 * API) and are only ever read.
 */

import { z } from 'zod'

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '')

/**
 * Comment as stored in the local ticket file
 */
export const TicketCommentRecordSchema = z.object({
  author: text,
  body: text,
  created_date: text,
})

/**
 * Ticket as stored in the local ticket file (snake_case, like the export
 * format of most ticket systems)
 */
export const TicketRecordSchema = z.object({
  id: z.string().trim().min(1, { message: 'id must not be empty' }),
  title: text,
  description: text,
  status: text,
  priority: text,
  assignee: text,
  reporter: text,
  created_date: text,
  updated_date: text,
  comments: z
    .array(TicketCommentRecordSchema)
    .nullish()
    .transform((value) => value ?? []),
})

export type TicketRecord = z.infer<typeof TicketRecordSchema>

export interface TicketComment {
  author: string
  body: string
  /** ISO timestamp, empty when unknown */
  createdAt: string
}

export interface Ticket {
  /** Ticket key, e.g. `PROJ-1001` */
  id: string
  title: string
  description: string
  status: string
  priority: string
  assignee: string
  reporter: string
  createdAt: string
  updatedAt: string
  /** Oldest first */
  comments: TicketComment[]
}

/**
 * Ticket with its relevance to a free-text query
 */
export interface TicketSearchResult {
  ticket: Ticket
  score: number
}

/**
 * Anything that can look a ticket up by id. Absence is `null`.
 */
export interface TicketProvider {
  /** Short label used in logs (`local`, `jira`, ...) */
  readonly name: string
  getTicket(id: string): Promise<Ticket | null>
}

export function toTicket(record: TicketRecord): Ticket {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    status: record.status,
    priority: record.priority,
    assignee: record.assignee,
    reporter: record.reporter,
    createdAt: record.created_date,
    updatedAt: record.updated_date,
    comments: record.comments.map((comment) => ({
      author: comment.author,
      body: comment.body,
      createdAt: comment.created_date,
    })),
  }
}
