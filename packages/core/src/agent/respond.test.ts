import { describe, expect, it } from 'vitest'
import type { Article } from '../knowledge/types'
import type { Ticket } from '../tickets/types'
import { composeResponse, contextualLine } from './respond'

const TICKET: Ticket = {
  id: 'PROJ-1001',
  title: 'Login page not loading',
  description: 'Blank screen after deploy',
  status: 'In Progress',
  priority: 'High',
  assignee: 'Sam Rivera',
  reporter: 'Alex Chen',
  createdAt: '2024-01-10T09:00:00Z',
  updatedAt: '2024-01-11T15:30:00Z',
  comments: [
    { author: 'Sam Rivera', body: 'Reproduced on staging.', createdAt: '' },
    { author: 'Alex Chen', body: 'Patch deployed to staging.', createdAt: '' },
    { author: 'Sam Rivera', body: 'Waiting for QA sign-off.', createdAt: '' },
  ],
}

const article = (overrides: Partial<Article> = {}): Article => ({
  id: 'KB-1',
  title: 'How to Reset Your Password',
  content: "Go to the login page and click 'Forgot Password'.",
  category: 'authentication',
  tags: ['password'],
  keywords: ['password', 'reset'],
  ...overrides,
})

const CLOSING = ['\n---', 'Is there anything else I can help you with?']

describe('composeResponse', () => {
  it('greets on the first turn and summarizes the ticket', () => {
    const response = composeResponse({
      query: 'What is the status of PROJ-1001?',
      ticket: TICKET,
      articles: [],
      firstTurn: true,
    })

    expect(response).toBe(
      [
        "Hello! I'm your customer support agent. How can I help you today?",
        '',
        '**Ticket Information:**',
        '**Ticket ID:** PROJ-1001',
        '**Title:** Login page not loading',
        '**Status:** In Progress',
        '**Priority:** High',
        '\n**Description:** Blank screen after deploy',
        '\n**Latest Updates:**',
        '  - Alex Chen: Patch deployed to staging.',
        '  - Sam Rivera: Waiting for QA sign-off.',
        '',
        '**Based on your query:**',
        'Your ticket is currently **In Progress**.',
        ...CLOSING,
      ].join('\n')
    )
  })

  it('quotes articles and marks cut content', () => {
    const long = 'x'.repeat(350)
    const response = composeResponse({
      query: 'password help',
      ticket: null,
      articles: [article(), article({ id: 'KB-2', title: 'Long', content: long })],
      firstTurn: false,
    })

    expect(response).toBe(
      [
        '**Relevant Information:**',
        '\n1. **How to Reset Your Password** (authentication)',
        "   Go to the login page and click 'Forgot Password'.",
        '\n2. **Long** (authentication)',
        `   ${'x'.repeat(300)}`,
        '   ...',
        '',
        '**Based on your query:**',
        "I've found some relevant information above that might help address your concern. " +
          'Please review the details and let me know if you need further assistance.',
        ...CLOSING,
      ].join('\n')
    )
  })

  it('does not mark content of exactly the quote length', () => {
    const response = composeResponse({
      query: 'anything',
      ticket: null,
      articles: [article({ content: 'y'.repeat(300) })],
      firstTurn: false,
    })

    expect(response.split('\n')).not.toContain('   ...')
  })

  it('quotes at most three articles', () => {
    const response = composeResponse({
      query: 'anything',
      ticket: null,
      articles: ['A', 'B', 'C', 'D'].map((t) => article({ title: t })),
      firstTurn: false,
    })

    expect(response).toContain('\n3. **C** (authentication)')
    expect(response).not.toContain('**D**')
  })

  it('falls back when nothing was found', () => {
    expect(
      composeResponse({ query: 'hello', ticket: null, articles: [], firstTurn: false })
    ).toBe(
      [
        "I couldn't find specific information related to your query. " +
          'Could you please provide more details or a ticket reference? ' +
          "I'm here to help you!",
        ...CLOSING,
      ].join('\n')
    )
  })

  it('fills empty ticket fields with N/A', () => {
    const response = composeResponse({
      query: 'PROJ-5',
      ticket: { ...TICKET, id: 'PROJ-5', priority: '', description: '', comments: [] },
      articles: [],
      firstTurn: false,
    })

    expect(response.split('\n')).toContain('**Priority:** N/A')
    expect(response).not.toContain('Description')
    expect(response).not.toContain('Latest Updates')
  })
})

describe('contextualLine', () => {
  it('reports the latest update for progress questions', () => {
    expect(contextualLine('any progress?', TICKET, [])).toBe(
      'Latest update on your ticket: Waiting for QA sign-off.'
    )
  })

  it('skips the progress rule when the ticket has no comments', () => {
    expect(contextualLine('any progress?', { ...TICKET, comments: [] }, [])).toBe('')
  })

  it('offers the top article as a solution for fix requests', () => {
    expect(contextualLine('How do I fix my login?', null, [article()])).toBe(
      "Based on our knowledge base, here's a potential solution: Go to the login page and click 'Forgot Password'."
    )
  })

  it('admits when no solution is known', () => {
    expect(contextualLine('please resolve this', null, [])).toBe(
      "I'm looking into solutions for you. Please check the relevant information above."
    )
  })

  it('echoes the ticket description for reported issues', () => {
    expect(contextualLine('I have an error', TICKET, [])).toBe(
      "I see you're experiencing an issue. Your ticket describes: Blank screen after deploy"
    )
  })

  it('needs a ticket for status questions', () => {
    expect(contextualLine('status please', null, [])).toBe('')
  })
})
