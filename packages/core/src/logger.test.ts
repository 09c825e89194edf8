import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, isLogLevel } from './logger'

const createSink = () => {
  const lines: string[] = []
  return { lines, write: (chunk: string) => lines.push(chunk) }
}

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes lines with the scope and appends context as JSON', () => {
    const sink = createSink()
    const logger = createLogger('knowledge', { level: 'debug', sink })

    logger.info('Loaded 5 articles')
    logger.warn('Skipped malformed article', { position: 3 })

    expect(sink.lines).toEqual([
      '[knowledge] Loaded 5 articles\n',
      '[knowledge] Skipped malformed article {"position":3}\n',
    ])
  })

  it('drops lines below the level', () => {
    const sink = createSink()
    const logger = createLogger('search', { level: 'warn', sink })

    logger.debug('hidden')
    logger.info('hidden')
    logger.error('shown')

    expect(sink.lines).toEqual(['[search] shown\n'])
  })

  it('writes nothing when silent', () => {
    const sink = createSink()
    const logger = createLogger('agent', { level: 'silent', sink })

    logger.error('hidden')

    expect(sink.lines).toEqual([])
  })

  it('falls back to the console and reads LOG_LEVEL per call', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger('tickets')

    logger.warn('hidden under the silent test level')
    process.env.LOG_LEVEL = 'WARN'
    try {
      logger.warn('Ticket PROJ-9 not found', { provider: 'local' })
    } finally {
      process.env.LOG_LEVEL = 'silent'
    }

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('[tickets] Ticket PROJ-9 not found', {
      provider: 'local',
    })
  })
})

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })
})
