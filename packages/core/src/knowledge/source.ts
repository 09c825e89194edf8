/**
 * File-backed article source
 *
 * Reads raw article records from disk and hands them to an ArticleIndex.
 * The index itself never touches the filesystem.
 */

import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { type Logger, createLogger } from '../logger'
import type { ArticleIndex } from './article-index'
import type { Article, LoadReport } from './types'

/**
 * Raw records read from one place (a file, a table, ...)
 */
export interface ArticleBatch {
  origin: string
  records: unknown[]
}

/**
 * Supplies raw article records to ArticleIndex#load
 */
export interface ArticleSource {
  describe(): string
  read(): Promise<ArticleBatch[]>
}

export const DEFAULT_ARTICLES_FILE = 'knowledge-base.json'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Every `*.json` file of a directory, in file-name order. A file holds
 * either one article object or an array of them.
 */
export class JsonDirectorySource implements ArticleSource {
  private readonly logger: Logger

  constructor(
    private readonly directory: string,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger('knowledge')
  }

  describe(): string {
    return this.directory
  }

  async read(): Promise<ArticleBatch[]> {
    let entries: string[]
    try {
      entries = await readdir(this.directory)
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Knowledge base directory ${this.directory} not found`)
        return []
      }
      throw error
    }

    const batches: ArticleBatch[] = []
    for (const file of entries.filter((name) => name.endsWith('.json')).sort()) {
      const path = join(this.directory, file)
      try {
        const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'))
        if (Array.isArray(parsed)) {
          batches.push({ origin: path, records: parsed })
        } else if (parsed !== null && typeof parsed === 'object') {
          batches.push({ origin: path, records: [parsed] })
        } else {
          this.logger.warn(`Ignoring ${path}: expected an article or a list of articles`)
        }
        this.logger.debug(`Read articles from ${path}`)
      } catch (error) {
        this.logger.error(`Error loading ${path}`, {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }

    return batches
  }
}

/**
 * Load every batch of a source into an index and merge the reports.
 */
export async function loadArticles(
  index: ArticleIndex,
  source: ArticleSource
): Promise<LoadReport> {
  const report: LoadReport = { loaded: [], skipped: [] }
  for (const batch of await source.read()) {
    const { loaded, skipped } = index.load(batch.records, batch.origin)
    report.loaded.push(...loaded)
    report.skipped.push(...skipped)
  }
  return report
}

/**
 * Write articles as pretty-printed JSON, creating the directory if needed.
 *
 * @returns Path of the written file
 */
export async function saveArticles(
  directory: string,
  articles: readonly Article[],
  fileName: string = DEFAULT_ARTICLES_FILE
): Promise<string> {
  await mkdir(directory, { recursive: true })
  const path = join(directory, fileName)
  await writeFile(path, `${JSON.stringify(articles, null, 2)}\n`, 'utf-8')
  return path
}
