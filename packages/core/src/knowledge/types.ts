/**
 * Knowledge module types
 *
 * Types for knowledge-base articles, ingestion records and search results.
 */

import { z } from 'zod'

/**
 * Category applied when an article arrives without one
 */
export const DEFAULT_CATEGORY = 'general'

/**
 * Default search configuration
 */
export const SEARCH_DEFAULTS = {
  /** Final number of results to return */
  MAX_RESULTS: 5,
  /** Minimum relevance score */
  MIN_SCORE: 0.1,
  /** Cap on keywords taken from a query */
  QUERY_KEYWORDS: 10,
  /** Characters of content kept in a search hit */
  EXCERPT_LENGTH: 300,
} as const

/**
 * Fixed bonuses added on top of the keyword-overlap ratio
 */
export const SCORING_WEIGHTS = {
  /** Query text found in the title */
  TITLE_MATCH: 0.3,
  /** Query text found in the content */
  CONTENT_MATCH: 0.1,
  /** Per tag (or category) equal to a query keyword */
  TAG_MATCH: 0.15,
} as const

const requiredText = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, {
      message: `${field} must not be empty`,
    })

/**
 * Raw article record as handed over by a loader or an explicit add.
 * Unknown fields are dropped.
 */
export const ArticleInputSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, { message: 'id must not be empty' })
    // Ids double as file names when articles are saved one per file
    .refine((id) => !/[/\\]|\.\./.test(id), {
      message: 'id must not contain path separators or ..',
    })
    .nullish(),
  title: requiredText('title'),
  content: requiredText('content'),
  category: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  keywords: z.array(z.string()).nullish(),
})

export type ArticleInput = z.input<typeof ArticleInputSchema>

/**
 * Article stored in an ArticleIndex. Defaults are resolved once at
 * ingestion and the object is frozen afterwards.
 */
export interface Article {
  /** Unique within its index */
  readonly id: string
  readonly title: string
  readonly content: string
  /** Single classification label, `general` when not supplied */
  readonly category: string
  readonly tags: readonly string[]
  /** Lower-cased keywords, supplied or derived from title and content */
  readonly keywords: readonly string[]
}

/**
 * A scored article produced by one search call
 */
export interface SearchResult {
  article: Article
  /** Unbounded relevance score, only meaningful relative to other results */
  score: number
}

/**
 * Flattened search result handed to callers outside the core
 */
export interface SearchHit {
  articleId: string
  title: string
  contentExcerpt: string
  category: string
  tags: string[]
  score: number
}

/**
 * Options for knowledge search
 */
export interface SearchOptions {
  /** Maximum number of results to return (default: 5) */
  maxResults?: number
  /** Minimum relevance score, inclusive (default: 0.1) */
  minScore?: number
}

/**
 * Query as seen by the scorer: the raw text plus its extracted keywords
 */
export interface ScoringQuery {
  text: string
  keywords: readonly string[]
}

/**
 * A record that could not be ingested during a bulk load
 */
export interface SkippedRecord {
  /** Zero-based position of the record in the loaded batch */
  position: number
  /** Where the batch came from (file, directory, ...) */
  origin?: string
  reason: string
}

/**
 * Outcome of ArticleIndex#load
 */
export interface LoadReport {
  loaded: Article[]
  skipped: SkippedRecord[]
}
