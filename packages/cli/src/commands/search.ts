import { toSearchHit } from '@deskhand/core'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { handleCommandError } from '../core/errors'
import { parseCount, parseScore } from '../core/options'
import { type Runtime, createRuntime } from '../core/runtime'

export interface SearchCommandOptions {
  limit?: number
  minScore?: number
}

/**
 * Rank knowledge-base articles for a query.
 *
 * Flags override MAX_SEARCH_RESULTS and MIN_RELEVANCE_SCORE.
 */
export async function searchArticles(
  ctx: CommandContext,
  runtime: Runtime,
  query: string,
  options: SearchCommandOptions = {}
): Promise<void> {
  const results = runtime.engine.search(query, {
    maxResults: options.limit ?? runtime.config.search.maxResults,
    minScore: options.minScore ?? runtime.config.search.minScore,
  })
  const hits = results.map((result) => toSearchHit(result))

  if (ctx.format === 'json') {
    ctx.output.data({ query, results: hits })
    return
  }

  if (hits.length === 0) {
    ctx.output.message(`No articles matched '${query}'.`)
    return
  }

  ctx.output.table(
    hits.map((hit) => ({
      ID: hit.articleId,
      Title: hit.title,
      Category: hit.category,
      Score: hit.score.toFixed(2),
    }))
  )
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search the knowledge base')
    .argument('<query...>', 'Search text')
    .option('-l, --limit <n>', 'Maximum number of results', parseCount)
    .option('-m, --min-score <score>', 'Minimum relevance score', parseScore)
    .action(
      async (words: string[], options: SearchCommandOptions, command: Command) => {
        const ctx = await contextFromCommand(command)
        try {
          const runtime = await createRuntime(ctx)
          await searchArticles(ctx, runtime, words.join(' '), options)
        } catch (error) {
          handleCommandError(ctx, error, 'Search failed.')
        }
      }
    )
}
