import {
  ArticleIndex,
  type DeskhandConfig,
  FileTicketStore,
  JsonDirectorySource,
  type LoadReport,
  type Logger,
  SearchEngine,
  SupportAgent,
  type TicketProvider,
  createJiraClient,
  createLogger,
  createTicketProvider,
  loadArticles,
  loadConfig,
} from '@deskhand/core'
import type { CommandContext } from './context'

/**
 * Everything a command needs, built once per process
 */
export interface Runtime {
  config: DeskhandConfig
  index: ArticleIndex
  engine: SearchEngine
  /** Local ticket file, also used for free-text ticket search */
  ticketStore: FileTicketStore
  /** Local store first, then the remote system when configured */
  tickets: TicketProvider
  agent: SupportAgent
  loadReport: LoadReport
  logger: (scope: string) => Logger
}

/**
 * Load configuration and the knowledge base, and wire the ticket chain
 * and agent.
 *
 * Core log lines go to stderr so stdout stays parseable.
 */
export async function createRuntime(
  ctx: CommandContext,
  config: DeskhandConfig = loadConfig(ctx.env)
): Promise<Runtime> {
  const level = ctx.verbose ? 'debug' : ctx.quiet ? 'error' : config.logLevel
  const logger = (scope: string) =>
    createLogger(scope, { level, sink: ctx.stderr })

  const index = new ArticleIndex({ logger: logger('knowledge') })
  const loadReport = await loadArticles(
    index,
    new JsonDirectorySource(config.knowledgeBasePath, {
      logger: logger('knowledge'),
    })
  )
  const engine = new SearchEngine(index, { logger: logger('search') })

  const ticketStore = new FileTicketStore(config.ticketsFile, {
    logger: logger('tickets'),
  })
  const providers: TicketProvider[] = [ticketStore]
  const remote = config.ticketSystem
  if (remote?.username && remote.apiToken) {
    providers.push(
      createJiraClient({
        baseUrl: remote.baseUrl,
        username: remote.username,
        apiToken: remote.apiToken,
        logger: logger('jira'),
      })
    )
  } else if (remote) {
    ctx.output.warn(
      'TICKET_SYSTEM_URL is set without TICKET_SYSTEM_USERNAME and TICKET_SYSTEM_API_TOKEN; using local tickets only.'
    )
  }
  const tickets = createTicketProvider(providers, { logger: logger('tickets') })

  const agent = new SupportAgent({
    knowledge: engine,
    tickets,
    searchOptions: config.search,
    logger: logger('agent'),
  })

  return { config, index, engine, ticketStore, tickets, agent, loadReport, logger }
}
