/**
 * One answered query
 */
export interface ConversationEntry {
  /** ISO timestamp */
  timestamp: string
  conversationId: string
  query: string
  response: string
  /** Ticket id detected in the query, if any */
  ticketReference: string | null
}

/**
 * In-memory record of answered queries, oldest first.
 */
export class ConversationHistory {
  private entries: ConversationEntry[] = []

  get size(): number {
    return this.entries.length
  }

  append(entry: ConversationEntry): void {
    this.entries.push(entry)
  }

  /**
   * Entries of one conversation, or all of them. Always a copy.
   */
  list(conversationId?: string): ConversationEntry[] {
    if (conversationId) {
      return this.entries.filter((e) => e.conversationId === conversationId)
    }
    return [...this.entries]
  }

  clear(): void {
    this.entries = []
  }
}
