/**
 * Lexical text analysis shared by knowledge search and ticket detection.
 *
 * Everything here is pure and deterministic: the same input always yields
 * the same keywords, reference and similarity.
 */

/**
 * Function words dropped during keyword extraction
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'is', 'at', 'which', 'on', 'a', 'an', 'as', 'are', 'was',
  'were', 'been', 'be', 'have', 'has', 'had', 'do', 'does', 'did',
  'will', 'would', 'should', 'could', 'may', 'might', 'must', 'can',
  'this', 'that', 'these', 'those',
])

/** Shortest token kept as a keyword */
export const MIN_KEYWORD_LENGTH = 3

// Letters and digits of any script are word characters; everything else splits.
const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u

// Project key (2+ letters), hyphen, number. Word boundaries on both ends
// reject fragments such as `A-1`, `abc123-4` or `ABC-12x`.
const TICKET_REFERENCE = /\b([A-Za-z]{2,})-(\d+)\b/

export interface TicketReferenceMatch {
  /** The span as written in the text */
  rawText: string
  /** Normalized id, project key upper-cased (e.g. `PROJ-1001`) */
  ticketId: string
  /** Offset of the span in the scanned text */
  index: number
}

/**
 * Extract keywords in first-seen order.
 *
 * Lower-cases the text, splits on anything that is not a letter or digit,
 * drops stop words and tokens shorter than three characters, removes
 * duplicates and keeps at most `maxKeywords`.
 *
 * @example
 * ```ts
 * extractKeywords('How do I reset my password? Reset link expired', 3)
 * // => ['how', 'reset', 'password']
 * ```
 */
export function extractKeywords(
  text: string,
  maxKeywords: number = Number.POSITIVE_INFINITY
): string[] {
  if (!text || maxKeywords <= 0) return []

  const seen = new Set<string>()
  for (const token of text.toLowerCase().split(TOKEN_SEPARATOR)) {
    if (token.length < MIN_KEYWORD_LENGTH || STOP_WORDS.has(token)) continue
    seen.add(token)
    if (seen.size >= maxKeywords) break
  }

  return [...seen]
}

/**
 * Find the first ticket reference in reading order.
 */
export function findTicketReference(text: string): TicketReferenceMatch | null {
  const match = TICKET_REFERENCE.exec(text)
  if (!match) return null

  const [rawText, projectKey = '', number = ''] = match
  return {
    rawText,
    ticketId: `${projectKey.toUpperCase()}-${number}`,
    index: match.index,
  }
}

/**
 * Extract the first ticket id mentioned in free text.
 *
 * Matching ignores case and the project key comes back upper-cased, so
 * `proj-7` yields `PROJ-7`.
 *
 * @example
 * ```ts
 * extractTicketReference('See PROJ-1001 for details') // => 'PROJ-1001'
 * extractTicketReference('no ticket here') // => null
 * ```
 */
export function extractTicketReference(text: string): string | null {
  return findTicketReference(text)?.ticketId ?? null
}

/**
 * Jaccard overlap of the keyword sets of two texts, in [0, 1].
 *
 * Returns 0 when either side has no keywords.
 */
export function calculateSimilarity(textA: string, textB: string): number {
  const wordsA = new Set(extractKeywords(textA))
  const wordsB = new Set(extractKeywords(textB))

  if (wordsA.size === 0 || wordsB.size === 0) return 0

  let intersection = 0
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++
  }
  const union = wordsA.size + wordsB.size - intersection

  return intersection / union
}

/**
 * Collapse whitespace runs and trim.
 */
export function cleanText(text: string): string {
  if (!text) return ''
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Clean text and cut it to `maxLength` characters, marking the cut with `...`.
 */
export function truncateText(text: string, maxLength: number): string {
  const cleaned = cleanText(text)
  if (cleaned.length <= maxLength) return cleaned
  return `${cleaned.slice(0, maxLength)}...`
}
