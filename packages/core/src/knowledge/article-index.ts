import { ValidationError } from '../errors'
import { type Logger, createLogger } from '../logger'
import { extractKeywords } from './text'
import {
  type Article,
  type ArticleInput,
  ArticleInputSchema,
  DEFAULT_CATEGORY,
  type LoadReport,
  type SkippedRecord,
} from './types'

export interface ArticleIndexOptions {
  logger?: Logger
}

/**
 * Prefix of ids assigned to articles ingested without one
 */
export const GENERATED_ID_PREFIX = 'KB-'

function uniqueBy(values: Iterable<string>, key: (value: string) => string): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const value of values) {
    const k = key(value)
    if (seen.has(k)) continue
    seen.add(k)
    result.push(value)
  }
  return result
}

function normalizeTags(tags: readonly string[]): string[] {
  return uniqueBy(
    tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0),
    (tag) => tag.toLowerCase()
  )
}

function normalizeKeywords(keywords: readonly string[]): string[] {
  return uniqueBy(
    keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean),
    (keyword) => keyword
  )
}

/**
 * In-memory knowledge-base article collection.
 *
 * Owns its articles and their keyword sets. Articles are frozen once
 * ingested; `add` and `load` belong to setup, searches only read.
 *
 * @example
 * ```ts
 * const index = new ArticleIndex()
 * index.add({
 *   title: 'Password Reset',
 *   content: 'Steps to reset your password...',
 *   category: 'authentication',
 *   tags: ['password', 'login'],
 * })
 * index.getById('KB-1')?.keywords // => ['password', 'reset', 'steps', 'your']
 * ```
 */
export class ArticleIndex {
  private readonly articles = new Map<string, Article>()
  private readonly logger: Logger
  private nextId = 1

  constructor(options: ArticleIndexOptions = {}) {
    this.logger = options.logger ?? createLogger('knowledge')
  }

  get size(): number {
    return this.articles.size
  }

  /**
   * Validate, normalize and store an article.
   *
   * @throws ValidationError when title or content is blank, a field has the
   * wrong type, or the id is already taken
   */
  add(input: ArticleInput): Article {
    return this.ingest(input)
  }

  getById(id: string): Article | null {
    return this.articles.get(id) ?? null
  }

  /**
   * Snapshot of all articles in insertion order
   */
  all(): Article[] {
    return [...this.articles.values()]
  }

  /**
   * Ingest a batch of raw records. Records that fail validation are
   * skipped and reported instead of aborting the batch.
   */
  load(records: Iterable<unknown>, origin?: string): LoadReport {
    const loaded: Article[] = []
    const skipped: SkippedRecord[] = []

    let position = 0
    for (const record of records) {
      try {
        loaded.push(this.ingest(record))
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error
        const entry: SkippedRecord = { position, reason: error.message }
        if (origin) entry.origin = origin
        skipped.push(entry)
        this.logger.warn('Skipped malformed article', { ...entry })
      }
      position++
    }

    this.logger.info(
      `Loaded ${loaded.length} articles${origin ? ` from ${origin}` : ''}`,
      skipped.length > 0 ? { skipped: skipped.length } : undefined
    )

    return { loaded, skipped }
  }

  private ingest(input: unknown): Article {
    const parsed = ArticleInputSchema.safeParse(input)
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid article', parsed.error)
    }

    const data = parsed.data
    const id = data.id ?? this.allocateId()
    if (this.articles.has(id)) {
      throw new ValidationError('Invalid article', [`id: ${id} already exists`])
    }

    const supplied = normalizeKeywords(data.keywords ?? [])
    const keywords =
      supplied.length > 0
        ? supplied
        : extractKeywords(`${data.title} ${data.content}`)

    const article: Article = Object.freeze({
      id,
      title: data.title,
      content: data.content,
      category: data.category?.trim() || DEFAULT_CATEGORY,
      tags: Object.freeze(normalizeTags(data.tags ?? [])),
      keywords: Object.freeze(keywords),
    })

    this.articles.set(id, article)
    this.logger.debug(`Added article ${id}: ${article.title}`)
    return article
  }

  private allocateId(): string {
    while (this.articles.has(`${GENERATED_ID_PREFIX}${this.nextId}`)) {
      this.nextId++
    }
    const id = `${GENERATED_ID_PREFIX}${this.nextId}`
    this.nextId++
    return id
  }
}
