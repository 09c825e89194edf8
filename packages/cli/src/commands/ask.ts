import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { handleCommandError } from '../core/errors'
import { type Runtime, createRuntime } from '../core/runtime'

export interface AskCommandOptions {
  conversation?: string
}

/**
 * Answer one question with the support agent.
 */
export async function askAgent(
  ctx: CommandContext,
  runtime: Runtime,
  question: string,
  options: AskCommandOptions = {}
): Promise<void> {
  const result = await runtime.agent.processQuery(question, options.conversation)

  if (ctx.format === 'json') {
    ctx.output.data(result)
    return
  }

  ctx.output.data(result.response)
  if (result.sources.length > 0) {
    ctx.output.message('')
    ctx.output.message('Sources:')
    for (const source of result.sources) {
      ctx.output.message(`  [${source.type}] ${source.id} ${source.title}`)
    }
  }
  ctx.output.progress(`Conversation: ${result.conversationId}`)
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask the support agent a question')
    .argument('<question...>', 'Question, may mention a ticket such as PROJ-1001')
    .option('-c, --conversation <id>', 'Conversation id to continue')
    .action(
      async (words: string[], options: AskCommandOptions, command: Command) => {
        const ctx = await contextFromCommand(command)
        try {
          const runtime = await createRuntime(ctx)
          await askAgent(ctx, runtime, words.join(' '), options)
        } catch (error) {
          handleCommandError(ctx, error, 'Could not answer the question.')
        }
      }
    )
}
