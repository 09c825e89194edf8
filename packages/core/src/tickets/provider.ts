import { type Logger, createLogger } from '../logger'
import type { Ticket, TicketProvider } from './types'

/**
 * Combine ticket providers into one that asks each in turn.
 *
 * The first ticket found wins. A provider that throws is logged and
 * skipped, so a flaky remote system never hides a ticket the local store
 * has. When every provider misses or fails the result is `null`.
 */
export function createTicketProvider(
  providers: TicketProvider[],
  options: { logger?: Logger } = {}
): TicketProvider {
  const logger = options.logger ?? createLogger('tickets')

  async function getTicket(id: string): Promise<Ticket | null> {
    for (const provider of providers) {
      try {
        const ticket = await provider.getTicket(id)
        if (ticket) return ticket
      } catch (error) {
        logger.error(`Error retrieving ticket ${id} from ${provider.name}`, {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }

    logger.debug(`Ticket ${id} not found`)
    return null
  }

  return {
    name: providers.map((p) => p.name).join('+') || 'none',
    getTicket,
  }
}
