import { type Article, SCORING_WEIGHTS, type ScoringQuery } from './types'

/**
 * Score one article against a query.
 *
 * Sum of, in this order:
 * 1. share of the (unique) query keywords found in the article keywords
 * 2. title / content bonus when the whole query text appears verbatim
 * 3. a bonus for every tag, and the category, equal to a query keyword
 *
 * The sum is not normalized; scores only order articles.
 *
 * @example
 * ```ts
 * scoreArticle(
 *   { text: 'password reset', keywords: ['password', 'reset'] },
 *   passwordResetArticle
 * )
 * // => 1 + 0.3 (title) + 0.15 (tag "password") ≈ 1.45
 * ```
 */
export function scoreArticle(query: ScoringQuery, article: Article): number {
  const queryKeywords = new Set(query.keywords)

  let overlap = 0
  for (const keyword of new Set(article.keywords)) {
    if (queryKeywords.has(keyword)) overlap++
  }
  let score = overlap / Math.max(1, queryKeywords.size)

  // Raw text, untrimmed; a whitespace-only query earns nothing here
  const needle = query.text.toLowerCase()
  if (needle.trim().length > 0) {
    if (article.title.toLowerCase().includes(needle)) {
      score += SCORING_WEIGHTS.TITLE_MATCH
    }
    if (article.content.toLowerCase().includes(needle)) {
      score += SCORING_WEIGHTS.CONTENT_MATCH
    }
  }

  if (queryKeywords.size > 0) {
    for (const label of [...article.tags, article.category]) {
      if (queryKeywords.has(label.toLowerCase())) {
        score += SCORING_WEIGHTS.TAG_MATCH
      }
    }
  }

  return score
}

/**
 * Class form of {@link scoreArticle} for callers that inject a scorer.
 */
export class RelevanceScorer {
  score(query: ScoringQuery, article: Article): number {
    return scoreArticle(query, article)
  }
}
