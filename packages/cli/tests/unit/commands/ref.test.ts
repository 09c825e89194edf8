import { describe, expect, it } from 'vitest'
import { detectReference } from '../../../src/commands/ref'
import { NotFoundError } from '../../../src/core/errors'
import { createTestContext } from '../../helpers/test-context'

describe('detectReference', () => {
  it('prints the normalized ticket id', async () => {
    const { ctx, getStdout } = await createTestContext()

    detectReference(ctx, 'see proj-42 please')

    expect(getStdout()).toBe('PROJ-42\n')
  })

  it('prints the match as JSON', async () => {
    const { ctx, getStdout } = await createTestContext({ format: 'json' })

    detectReference(ctx, 'see proj-42 please')

    expect(JSON.parse(getStdout())).toEqual({
      rawText: 'proj-42',
      ticketId: 'PROJ-42',
      index: 4,
    })
  })

  it('throws NotFoundError when no ticket is mentioned', async () => {
    const { ctx } = await createTestContext()

    expect(() => detectReference(ctx, 'my login is broken')).toThrow(NotFoundError)
  })
})
