import { describe, expect, it } from 'vitest'
import * as core from '../index'

describe('packages/core', () => {
  it('exports the knowledge module', () => {
    expect(core).toHaveProperty('ArticleIndex')
    expect(core).toHaveProperty('SearchEngine')
    expect(core).toHaveProperty('RelevanceScorer')
    expect(core).toHaveProperty('extractKeywords')
    expect(core).toHaveProperty('extractTicketReference')
    expect(core).toHaveProperty('calculateSimilarity')
  })

  it('exports ticket providers', () => {
    expect(core).toHaveProperty('FileTicketStore')
    expect(core).toHaveProperty('createJiraClient')
    expect(core).toHaveProperty('createTicketProvider')
  })

  it('exports the agent', () => {
    expect(core).toHaveProperty('SupportAgent')
    expect(core).toHaveProperty('composeResponse')
    expect(core).toHaveProperty('interpolateTemplate')
  })

  it('exports config, errors and logging', () => {
    expect(core).toHaveProperty('loadConfig')
    expect(core).toHaveProperty('ValidationError')
    expect(core).toHaveProperty('createLogger')
    expect(core.VERSION).toBe('0.1.0')
  })
})
