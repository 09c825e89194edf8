/**
 * Knowledge Base Module
 *
 * Deterministic lexical retrieval over an in-memory article collection:
 * keyword extraction, per-article scoring, thresholding and ranking.
 *
 * @example
 * ```ts
 * import { ArticleIndex, SearchEngine } from '@deskhand/core/knowledge'
 *
 * const index = new ArticleIndex()
 * index.add({
 *   title: 'Password Reset',
 *   content: 'Steps to reset your password...',
 *   category: 'authentication',
 *   tags: ['password', 'login'],
 * })
 *
 * const results = new SearchEngine(index).search('password reset', {
 *   maxResults: 3,
 *   minScore: 0.1,
 * })
 * ```
 */

// Types
export {
  ArticleInputSchema,
  DEFAULT_CATEGORY,
  SCORING_WEIGHTS,
  SEARCH_DEFAULTS,
  type Article,
  type ArticleInput,
  type LoadReport,
  type ScoringQuery,
  type SearchHit,
  type SearchOptions,
  type SearchResult,
  type SkippedRecord,
} from './types'

// Text analysis
export {
  MIN_KEYWORD_LENGTH,
  STOP_WORDS,
  calculateSimilarity,
  cleanText,
  extractKeywords,
  extractTicketReference,
  findTicketReference,
  truncateText,
  type TicketReferenceMatch,
} from './text'

// Index, scoring and search
export {
  ArticleIndex,
  GENERATED_ID_PREFIX,
  type ArticleIndexOptions,
} from './article-index'
export { RelevanceScorer, scoreArticle } from './scorer'
export {
  SearchEngine,
  resolveSearchOptions,
  toSearchHit,
  type ArticleScorer,
  type SearchEngineOptions,
} from './search'

// File-backed source
export {
  DEFAULT_ARTICLES_FILE,
  JsonDirectorySource,
  loadArticles,
  saveArticles,
  type ArticleBatch,
  type ArticleSource,
} from './source'
