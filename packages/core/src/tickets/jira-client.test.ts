import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { silentLogger } from '../logger'
import { JiraApiError, createJiraClient, retryDelay } from './jira-client'

const ISSUE = {
  key: 'PROJ-1001',
  fields: {
    summary: 'Login page not loading',
    description: 'Blank screen after deploy',
    status: { name: 'In Progress' },
    priority: { name: 'High' },
    assignee: { displayName: 'Sam Rivera' },
    reporter: null,
    created: '2024-01-10T09:00:00Z',
    updated: '2024-01-11T15:30:00Z',
    comment: {
      comments: [
        {
          author: { displayName: 'Sam Rivera' },
          body: 'Reproduced on staging.',
          created: '2024-01-10T10:00:00Z',
        },
      ],
    },
  },
}

const json = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  })

describe('createJiraClient', () => {
  const mockFetch = vi.fn<typeof fetch>()
  const sleep = vi.fn((_ms: number) => Promise.resolve())

  const client = (maxRetries?: number) =>
    createJiraClient({
      baseUrl: 'https://tickets.example.com/',
      username: 'support-bot',
      apiToken: 'test-token',
      maxRetries,
      logger: silentLogger,
      sleep,
    })

  beforeEach(() => {
    mockFetch.mockReset()
    sleep.mockClear()
    vi.stubGlobal('fetch', mockFetch)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('fetches an issue with basic auth and maps it to a ticket', async () => {
    mockFetch.mockResolvedValueOnce(json(ISSUE))

    const ticket = await client().getTicket('PROJ-1001')

    expect(mockFetch).toHaveBeenCalledWith(
      'https://tickets.example.com/rest/api/2/issue/PROJ-1001',
      {
        method: 'GET',
        headers: {
          Authorization: `Basic ${Buffer.from('support-bot:test-token').toString('base64')}`,
          Accept: 'application/json',
        },
      }
    )
    expect(ticket).toEqual({
      id: 'PROJ-1001',
      title: 'Login page not loading',
      description: 'Blank screen after deploy',
      status: 'In Progress',
      priority: 'High',
      assignee: 'Sam Rivera',
      reporter: '',
      createdAt: '2024-01-10T09:00:00Z',
      updatedAt: '2024-01-11T15:30:00Z',
      comments: [
        {
          author: 'Sam Rivera',
          body: 'Reproduced on staging.',
          createdAt: '2024-01-10T10:00:00Z',
        },
      ],
    })
  })

  it('returns null on 404', async () => {
    mockFetch.mockResolvedValueOnce(json({ errorMessages: [] }, { status: 404 }))

    expect(await client().getTicket('PROJ-9')).toBeNull()
  })

  it('throws JiraApiError on other failures', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('boom', { status: 500, statusText: 'Internal Server Error' })
    )

    const error = await client()
      .getTicket('PROJ-1')
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(JiraApiError)
    expect(error instanceof JiraApiError && error.status).toBe(500)
    expect(error instanceof Error && error.message).toBe(
      'Ticket request for PROJ-1 failed with status 500 Internal Server Error'
    )
  })

  it('rejects payloads without an issue key', async () => {
    mockFetch.mockResolvedValueOnce(json({ fields: {} }))

    await expect(client().getTicket('PROJ-1')).rejects.toThrow(
      /Unexpected ticket payload for PROJ-1: key: Required/
    )
  })

  it('retries after a 429 honoring Retry-After', async () => {
    mockFetch
      .mockResolvedValueOnce(
        new Response(null, { status: 429, headers: { 'Retry-After': '2' } })
      )
      .mockResolvedValueOnce(json(ISSUE))

    const ticket = await client().getTicket('PROJ-1001')

    expect(ticket?.id).toBe('PROJ-1001')
    expect(mockFetch).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(2000)
  })

  it('gives up after the configured number of attempts', async () => {
    mockFetch.mockImplementation(() =>
      Promise.resolve(new Response(null, { status: 429 }))
    )

    await expect(client(2).getTicket('PROJ-1')).rejects.toThrow(
      'Rate limited: max retries exceeded'
    )
    expect(mockFetch).toHaveBeenCalledTimes(2)
    // no wait after the last attempt
    expect(sleep.mock.calls).toEqual([[1000]])
  })

  it('throws without sleeping when only one attempt is allowed', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(null, { status: 429, headers: { 'Retry-After': '30' } })
    )

    await expect(client(1).getTicket('PROJ-1')).rejects.toThrow(
      'Rate limited: max retries exceeded'
    )
    expect(sleep).not.toHaveBeenCalled()
  })
})

describe('retryDelay', () => {
  it('backs off exponentially up to 30 seconds', () => {
    const response = new Response(null, { status: 429 })

    expect(retryDelay(response, 0)).toBe(1000)
    expect(retryDelay(response, 3)).toBe(8000)
    expect(retryDelay(response, 10)).toBe(30000)
  })
})
