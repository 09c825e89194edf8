import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { type Prompt, runChat } from '../../../src/commands/chat'
import { type Runtime, createRuntime } from '../../../src/core/runtime'
import { createTestContext } from '../../helpers/test-context'
import { type TestWorkspace, createWorkspace } from '../../helpers/workspace'

const scripted = (...answers: string[]): Prompt => {
  const queue = [...answers]
  return async () => {
    const next = queue.shift()
    if (next === undefined) throw new Error('prompt called too often')
    return next
  }
}

class ExitPromptError extends Error {
  override name = 'ExitPromptError'
}

describe('runChat', () => {
  let workspace: TestWorkspace
  let runtime: Runtime

  beforeEach(async () => {
    workspace = createWorkspace()
    const { ctx } = await createTestContext()
    runtime = await createRuntime(ctx, workspace.config)
  })

  afterEach(() => {
    workspace.cleanup()
  })

  it('answers questions in one conversation until an exit word', async () => {
    const { ctx, getStdout, getStderr } = await createTestContext()
    const processQuery = vi.spyOn(runtime.agent, 'processQuery')

    await runChat(
      ctx,
      runtime,
      scripted('', 'What is the status of PROJ-1001?', 'any progress?', 'BYE')
    )

    expect(processQuery).toHaveBeenCalledTimes(2)
    const firstId = runtime.agent.getHistory()[0]?.conversationId
    expect(processQuery).toHaveBeenLastCalledWith('any progress?', firstId)
    expect(getStdout()).toContain('Your ticket is currently **In Progress**.')
    expect(getStderr().endsWith('Goodbye!\n')).toBe(true)
  })

  it('replays the conversation on history', async () => {
    const { ctx, getStdout } = await createTestContext()

    await runChat(
      ctx,
      runtime,
      scripted('How do I reset my password?', 'history', 'exit')
    )

    const lines = getStdout().split('\n')
    expect(lines).toContain('1. You: How do I reset my password?')
    expect(
      lines.some((line) =>
        line.startsWith("   Agent: Hello! I'm your customer support agent.")
      )
    ).toBe(true)
  })

  it('says so when there is no history yet', async () => {
    const { ctx, getStderr } = await createTestContext()

    await runChat(ctx, runtime, scripted('history', 'quit'))

    expect(getStderr()).toContain('No conversation history yet.\n')
  })

  it('ends quietly when the prompt is cancelled', async () => {
    const { ctx, getStderr } = await createTestContext()
    const prompt: Prompt = async () => {
      throw new ExitPromptError('User force closed the prompt')
    }

    await runChat(ctx, runtime, prompt)

    expect(getStderr().endsWith('Goodbye!\n')).toBe(true)
  })

  it('propagates other prompt failures', async () => {
    const { ctx } = await createTestContext()
    const prompt: Prompt = async () => {
      throw new Error('stdin closed')
    }

    await expect(runChat(ctx, runtime, prompt)).rejects.toThrow('stdin closed')
  })
})
