import { truncateText } from '@deskhand/core'
import { input } from '@inquirer/prompts'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { handleCommandError } from '../core/errors'
import { type Runtime, createRuntime } from '../core/runtime'

export const EXIT_WORDS: ReadonlySet<string> = new Set(['exit', 'quit', 'bye'])

/** Characters of each answer shown by `history` */
export const HISTORY_PREVIEW = 80

/** Reads one line from the user */
export type Prompt = (message: string) => Promise<string>

const defaultPrompt: Prompt = (message) => input({ message })

// Ctrl+C inside an @inquirer prompt rejects with ExitPromptError
const isPromptExit = (error: unknown): boolean =>
  error instanceof Error && error.name === 'ExitPromptError'

/**
 * Interactive session with the support agent.
 *
 * `exit`, `quit` or `bye` end the session and `history` replays it.
 * Every turn shares one conversation id.
 */
export async function runChat(
  ctx: CommandContext,
  runtime: Runtime,
  prompt: Prompt = defaultPrompt
): Promise<void> {
  ctx.output.message(
    "Type your question (mention a ticket like PROJ-1001), 'history' to review, 'exit' to leave."
  )
  let conversationId: string | undefined

  while (true) {
    let line: string
    try {
      line = (await prompt('You:')).trim()
    } catch (error) {
      if (isPromptExit(error)) break
      throw error
    }

    if (!line) continue

    const command = line.toLowerCase()
    if (EXIT_WORDS.has(command)) break

    if (command === 'history') {
      const entries = runtime.agent.getHistory(conversationId)
      if (entries.length === 0) {
        ctx.output.message('No conversation history yet.')
        continue
      }
      entries.forEach((entry, i) => {
        ctx.output.data(`${i + 1}. You: ${entry.query}`)
        ctx.output.data(`   Agent: ${truncateText(entry.response, HISTORY_PREVIEW)}`)
      })
      continue
    }

    const result = await runtime.agent.processQuery(line, conversationId)
    conversationId = result.conversationId
    ctx.output.data(result.response)
  }

  ctx.output.message('Goodbye!')
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Start an interactive support session')
    .action(async (_options: unknown, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        await runChat(ctx, await createRuntime(ctx))
      } catch (error) {
        handleCommandError(ctx, error, 'Chat session failed.')
      }
    })
}
