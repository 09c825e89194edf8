/**
 * Knowledge-base commands: list, show and add articles.
 *
 * Added articles are written to their own file in KNOWLEDGE_BASE_PATH so
 * the next run loads them with the rest.
 */

import { type Article, type ArticleInput, saveArticles } from '@deskhand/core'
import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { NotFoundError, handleCommandError } from '../core/errors'
import { collect } from '../core/options'
import { type Runtime, createRuntime } from '../core/runtime'

export function listArticles(ctx: CommandContext, runtime: Runtime): void {
  const articles = runtime.index.all()

  if (ctx.format === 'json') {
    ctx.output.data({ articles, skipped: runtime.loadReport.skipped })
    return
  }

  if (articles.length === 0) {
    ctx.output.message(
      `No articles found in ${runtime.config.knowledgeBasePath}.`
    )
    return
  }

  ctx.output.table(
    articles.map((article) => ({
      ID: article.id,
      Title: article.title,
      Category: article.category,
      Tags: article.tags,
    }))
  )
  if (runtime.loadReport.skipped.length > 0) {
    ctx.output.warn(
      `${runtime.loadReport.skipped.length} malformed article(s) were skipped.`
    )
  }
}

const formatArticle = (article: Article): string[] => [
  `${article.id}: ${article.title}`,
  `Category: ${article.category}`,
  `Tags:     ${article.tags.join(', ') || '-'}`,
  `Keywords: ${article.keywords.join(', ') || '-'}`,
  '',
  article.content,
]

/**
 * @throws NotFoundError for an unknown id
 */
export function showArticle(
  ctx: CommandContext,
  runtime: Runtime,
  id: string
): void {
  const article = runtime.index.getById(id)
  if (!article) {
    throw new NotFoundError({
      userMessage: `Article ${id} not found.`,
      suggestion: 'List ids with `deskhand kb list`.',
    })
  }

  if (ctx.format === 'json') {
    ctx.output.data(article)
    return
  }
  for (const line of formatArticle(article)) {
    ctx.output.data(line)
  }
}

export interface AddArticleOptions {
  id?: string
  title: string
  content: string
  category?: string
  tag?: string[]
  keyword?: string[]
}

/**
 * Validate an article against the loaded index and persist it.
 *
 * @throws ValidationError for missing fields or an id already in use
 */
export async function addArticle(
  ctx: CommandContext,
  runtime: Runtime,
  options: AddArticleOptions
): Promise<Article> {
  const input: ArticleInput = {
    id: options.id,
    title: options.title,
    content: options.content,
    category: options.category,
    tags: options.tag,
    keywords: options.keyword,
  }
  const article = runtime.index.add(input)
  const path = await saveArticles(
    runtime.config.knowledgeBasePath,
    [article],
    `${article.id.toLowerCase()}.json`
  )

  if (ctx.format === 'json') {
    ctx.output.data({ article, path })
  } else {
    ctx.output.success(`Added ${article.id} to ${path}`)
  }
  return article
}

export function registerKbCommands(program: Command): void {
  const kb = program.command('kb').description('Manage knowledge base content')

  kb.command('list')
    .description('List loaded articles')
    .action(async (_options: unknown, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        listArticles(ctx, await createRuntime(ctx))
      } catch (error) {
        handleCommandError(ctx, error, 'Could not list articles.')
      }
    })

  kb.command('show')
    .description('Show one article')
    .argument('<id>', 'Article id, e.g. KB-1')
    .action(async (id: string, _options: unknown, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        showArticle(ctx, await createRuntime(ctx), id)
      } catch (error) {
        handleCommandError(ctx, error)
      }
    })

  kb.command('add')
    .description('Add an article to the knowledge base directory')
    .requiredOption('-t, --title <title>', 'Article title')
    .requiredOption('-c, --content <content>', 'Article body')
    .option('--id <id>', 'Explicit id (generated when omitted)')
    .option('--category <category>', 'Category (default: general)')
    .option('--tag <tag>', 'Tag, repeatable', collect)
    .option('--keyword <keyword>', 'Keyword, repeatable', collect)
    .action(async (options: AddArticleOptions, command: Command) => {
      const ctx = await contextFromCommand(command)
      try {
        await addArticle(ctx, await createRuntime(ctx), options)
      } catch (error) {
        handleCommandError(ctx, error, 'Could not add the article.')
      }
    })
}
