import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { DeskhandConfig } from '@deskhand/core'

export const ARTICLES = [
  {
    id: 'KB-1',
    title: 'How to Reset Your Password',
    content:
      "To reset your password, go to the login page and click 'Forgot Password'.",
    category: 'authentication',
    tags: ['password', 'login'],
    keywords: ['password', 'reset', 'login', 'forgot'],
  },
  {
    id: 'KB-2',
    title: 'Payment Processing Guide',
    content: 'Select the payment method and enter your card details.',
    category: 'payments',
    tags: ['payment', 'billing'],
    keywords: ['payment', 'card', 'billing'],
  },
]

export const TICKETS = [
  {
    id: 'PROJ-1001',
    title: 'Unable to login',
    description: 'Login page returns an error after entering credentials.',
    status: 'In Progress',
    priority: 'High',
    assignee: 'Jordan Lee',
    reporter: 'Casey Morgan',
    created_date: '2024-01-15T10:30:00Z',
    updated_date: '2024-01-16T14:20:00Z',
    comments: [
      {
        author: 'Jordan Lee',
        body: 'Fix is in review.',
        created_date: '2024-01-16T14:20:00Z',
      },
    ],
  },
  {
    id: 'PROJ-1002',
    title: 'Add dark mode',
    description: 'Customers asked for a dark theme.',
    status: 'Open',
    priority: 'Low',
  },
]

export interface TestWorkspace {
  root: string
  config: DeskhandConfig
  cleanup: () => void
}

/**
 * Temporary knowledge-base directory and ticket file with sample data
 */
export function createWorkspace(): TestWorkspace {
  const root = mkdtempSync(join(tmpdir(), 'deskhand-cli-'))
  const knowledgeBasePath = join(root, 'kb')
  const ticketsFile = join(root, 'tickets.json')

  mkdirSync(knowledgeBasePath)
  writeFileSync(join(knowledgeBasePath, 'articles.json'), JSON.stringify(ARTICLES))
  writeFileSync(ticketsFile, JSON.stringify(TICKETS))

  return {
    root,
    config: {
      knowledgeBasePath,
      ticketsFile,
      ticketSystem: null,
      search: { maxResults: 5, minScore: 0.1 },
      logLevel: 'silent',
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  }
}
