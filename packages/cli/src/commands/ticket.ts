import { type Ticket, normalizeTicketId } from '@deskhand/core'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { NotFoundError, handleCommandError } from '../core/errors'
import { parseCount } from '../core/options'
import { type Runtime, createRuntime } from '../core/runtime'

const formatTicket = (ticket: Ticket): string[] => {
  const lines = [
    `${ticket.id}: ${ticket.title}`,
    `Status:   ${ticket.status || 'N/A'}`,
    `Priority: ${ticket.priority || 'N/A'}`,
    `Assignee: ${ticket.assignee || 'Unassigned'}`,
    `Reporter: ${ticket.reporter || 'N/A'}`,
    `Updated:  ${ticket.updatedAt || 'N/A'}`,
  ]
  if (ticket.description) {
    lines.push('', ticket.description)
  }
  if (ticket.comments.length > 0) {
    lines.push('', `Comments (${ticket.comments.length}):`)
    for (const comment of ticket.comments) {
      lines.push(`  - ${comment.author || 'N/A'}: ${comment.body}`)
    }
  }
  return lines
}

/**
 * Print one ticket from the local store or the remote system.
 *
 * @throws NotFoundError when no provider knows the id
 */
export async function showTicket(
  ctx: CommandContext,
  runtime: Runtime,
  id: string
): Promise<void> {
  const ticketId = normalizeTicketId(id)
  const ticket = await runtime.tickets.getTicket(ticketId)
  if (!ticket) {
    throw new NotFoundError({
      userMessage: `Ticket ${ticketId} not found.`,
      suggestion: 'Check the id, or search with `deskhand ticket search <text>`.',
    })
  }

  if (ctx.format === 'json') {
    ctx.output.data(ticket)
    return
  }
  for (const line of formatTicket(ticket)) {
    ctx.output.data(line)
  }
}

export interface TicketSearchOptions {
  limit?: number
}

/**
 * Free-text search over the local ticket file.
 */
export async function searchTicketsCommand(
  ctx: CommandContext,
  runtime: Runtime,
  query: string,
  options: TicketSearchOptions = {}
): Promise<void> {
  const results = await runtime.ticketStore.searchTickets(query, options.limit)

  if (ctx.format === 'json') {
    ctx.output.data({
      query,
      results: results.map(({ ticket, score }) => ({ ...ticket, score })),
    })
    return
  }

  if (results.length === 0) {
    ctx.output.message(`No tickets matched '${query}'.`)
    return
  }

  ctx.output.table(
    results.map(({ ticket, score }) => ({
      ID: ticket.id,
      Title: ticket.title,
      Status: ticket.status,
      Priority: ticket.priority,
      Score: score.toFixed(2),
    }))
  )
}

export function registerTicketCommands(program: Command): void {
  const ticket = program.command('ticket').description('Look up support tickets')

  ticket
    .command('show')
    .description('Show a ticket by id')
    .argument('<id>', 'Ticket id, e.g. PROJ-1001')
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        const runtime = await createRuntime(ctx)
        await showTicket(ctx, runtime, id)
      } catch (error) {
        handleCommandError(ctx, error, 'Ticket lookup failed.')
      }
    })

  ticket
    .command('search')
    .description('Search local tickets by text')
    .argument('<query...>', 'Search text')
    .option('-l, --limit <n>', 'Maximum number of results', parseCount)
    .action(
      async (words: string[], options: TicketSearchOptions, command: Command) => {
        const ctx = await contextFromCommand(command)
        try {
          const runtime = await createRuntime(ctx)
          await searchTicketsCommand(ctx, runtime, words.join(' '), options)
        } catch (error) {
          handleCommandError(ctx, error, 'Ticket search failed.')
        }
      }
    )
}
