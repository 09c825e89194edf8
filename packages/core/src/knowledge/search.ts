/**
 * Knowledge search module
 *
 * Scores every article of an ArticleIndex against a query, drops results
 * under the threshold, ranks the rest and caps the list.
 */

import { type Logger, createLogger } from '../logger'
import type { ArticleIndex } from './article-index'
import { RelevanceScorer } from './scorer'
import { extractKeywords, truncateText } from './text'
import {
  type Article,
  SEARCH_DEFAULTS,
  type ScoringQuery,
  type SearchHit,
  type SearchOptions,
  type SearchResult,
} from './types'

/**
 * Any number is accepted: the cap is floored and clamped at 0, NaN falls
 * back to the default. Infinite thresholds keep everything (-Infinity)
 * or nothing (+Infinity).
 */
export function resolveSearchOptions(
  options: SearchOptions = {}
): Required<SearchOptions> {
  const maxResults = options.maxResults ?? SEARCH_DEFAULTS.MAX_RESULTS
  const minScore = options.minScore ?? SEARCH_DEFAULTS.MIN_SCORE
  return {
    maxResults: Number.isNaN(maxResults)
      ? SEARCH_DEFAULTS.MAX_RESULTS
      : Math.max(0, Math.floor(maxResults)),
    minScore: Number.isNaN(minScore) ? SEARCH_DEFAULTS.MIN_SCORE : minScore,
  }
}

/**
 * Anything able to score an article for a query
 */
export interface ArticleScorer {
  score(query: ScoringQuery, article: Article): number
}

export interface SearchEngineOptions {
  /** Defaults to the lexical RelevanceScorer */
  scorer?: ArticleScorer
  logger?: Logger
}

/**
 * Read-only search over an ArticleIndex.
 *
 * @example
 * ```ts
 * const engine = new SearchEngine(index)
 * const results = engine.search('password reset', { maxResults: 3 })
 * results[0]?.article.title // => 'Password Reset'
 * ```
 */
export class SearchEngine {
  private readonly scorer: ArticleScorer
  private readonly logger: Logger

  constructor(
    private readonly index: ArticleIndex,
    options: SearchEngineOptions = {}
  ) {
    this.scorer = options.scorer ?? new RelevanceScorer()
    this.logger = options.logger ?? createLogger('search')
  }

  /**
   * Rank articles for a query.
   *
   * A query without keywords still gets a scoring pass: tag and substring
   * bonuses can apply. No match yields an empty list; search never throws.
   */
  search(query: string, options: SearchOptions = {}): SearchResult[] {
    const { maxResults, minScore } = resolveSearchOptions(options)

    const scoringQuery: ScoringQuery = {
      text: query,
      keywords: extractKeywords(query, SEARCH_DEFAULTS.QUERY_KEYWORDS),
    }

    const results: SearchResult[] = []
    for (const article of this.index.all()) {
      const score = this.scorer.score(scoringQuery, article)
      if (score >= minScore) {
        results.push({ article, score })
      }
    }

    // Array#sort is stable: equal scores keep index insertion order
    results.sort((a, b) => b.score - a.score)
    const ranked = results.slice(0, maxResults)

    this.logger.debug(
      `Knowledge base search for '${query}' returned ${ranked.length} results`,
      { matched: results.length, maxResults, minScore }
    )

    return ranked
  }
}

/**
 * Flatten a search result for callers outside the core.
 */
export function toSearchHit(
  result: SearchResult,
  excerptLength: number = SEARCH_DEFAULTS.EXCERPT_LENGTH
): SearchHit {
  const { article, score } = result
  return {
    articleId: article.id,
    title: article.title,
    contentExcerpt: truncateText(article.content, excerptLength),
    category: article.category,
    tags: [...article.tags],
    score,
  }
}
