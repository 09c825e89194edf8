import { describe, expect, it } from 'vitest'
import { type ConversationEntry, ConversationHistory } from './history'

const entry = (conversationId: string, query: string): ConversationEntry => ({
  timestamp: '2024-01-15T12:00:00.000Z',
  conversationId,
  query,
  response: `answer to ${query}`,
  ticketReference: null,
})

describe('ConversationHistory', () => {
  it('lists entries oldest first, optionally per conversation', () => {
    const history = new ConversationHistory()
    history.append(entry('conv-a', 'first'))
    history.append(entry('conv-b', 'second'))
    history.append(entry('conv-a', 'third'))

    expect(history.size).toBe(3)
    expect(history.list().map((e) => e.query)).toEqual(['first', 'second', 'third'])
    expect(history.list('conv-a').map((e) => e.query)).toEqual(['first', 'third'])
    expect(history.list('conv-c')).toEqual([])
  })

  it('returns copies', () => {
    const history = new ConversationHistory()
    history.append(entry('conv-a', 'first'))

    history.list().pop()

    expect(history.size).toBe(1)
  })

  it('clears everything', () => {
    const history = new ConversationHistory()
    history.append(entry('conv-a', 'first'))

    history.clear()

    expect(history.size).toBe(0)
    expect(history.list()).toEqual([])
  })
})
