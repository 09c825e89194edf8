import { findTicketReference } from '@deskhand/core'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { NotFoundError, handleCommandError } from '../core/errors'

/**
 * Print the first ticket reference found in text. Needs no configuration.
 *
 * @throws NotFoundError when the text mentions no ticket
 */
export function detectReference(ctx: CommandContext, text: string): void {
  const match = findTicketReference(text)
  if (!match) {
    throw new NotFoundError({ userMessage: 'No ticket reference found.' })
  }

  if (ctx.format === 'json') {
    ctx.output.data(match)
    return
  }
  ctx.output.data(match.ticketId)
}

export function registerRefCommand(program: Command): void {
  program
    .command('ref')
    .description('Detect a ticket reference (e.g. PROJ-1001) in text')
    .argument('<text...>', 'Text to scan')
    .action(async (words: string[], _options: unknown, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        detectReference(ctx, words.join(' '))
      } catch (error) {
        handleCommandError(ctx, error)
      }
    })
}
