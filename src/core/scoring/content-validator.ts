import type { CandidateMatch } from '../../types/match'
import type { MetadataRecord } from '../../types/record'
import type { ContentValidationConfig, MatcherConfig } from '../../types/config'
import { DEFAULT_MATCHER_CONFIG } from '../config'
import STOP_WORD_LIST from './stop-words.json'

const STOP_WORDS: ReadonlySet<string> = new Set(STOP_WORD_LIST)

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu

/**
 * Filtered words and adjacent-word phrases taken from a summary.
 */
export interface SummaryTerms {
  words: string[]
  phrases: string[]
}

/**
 * Lowercases text, splits on whitespace, trims punctuation from each token
 * and drops short tokens and stop words.
 *
 * @example
 * ```typescript
 * tokenize('We discussed the roadmap, again.', 4) // ['discussed', 'roadmap', 'again']
 * ```
 */
export function tokenize(text: string, minWordLength: number): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(EDGE_PUNCTUATION, ''))
    .filter((token) => token.length >= minWordLength && !STOP_WORDS.has(token))
}

/**
 * Joins each pair of adjacent words into a two-word phrase.
 */
export function bigrams(words: readonly string[]): string[] {
  const phrases: string[] = []
  for (let i = 0; i < words.length - 1; i++) {
    phrases.push(`${words[i]} ${words[i + 1]}`)
  }
  return phrases
}

/**
 * Extracts the words and phrases of a summary's leading section.
 */
export function extractSummaryTerms(
  summary: string,
  config: ContentValidationConfig = DEFAULT_MATCHER_CONFIG.validation
): SummaryTerms {
  const words = tokenize(summary.slice(0, config.summaryPrefixLength), config.minWordLength)
  return { words, phrases: bigrams(words) }
}

/**
 * Lowercases, replaces punctuation with spaces and collapses whitespace,
 * so verbatim checks ignore punctuation differences.
 */
function stripPunctuation(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Scores how well a transcript's text supports a record's summary.
 *
 * `0.4 × word score + 0.6 × phrase score`, where the word score is the
 * fraction of filtered summary words found in the transcript and the phrase
 * score the fraction of summary bigrams that also appear as adjacent filtered
 * words in the transcript. Phrases are not searched as raw substrings: both
 * sides drop stop words and short words first, so "roadmap for Q3 launch"
 * yields the phrase "roadmap launch" in summary and transcript alike. A
 * bonus is added when the start of the summary appears verbatim in the
 * transcript. The result is clamped to [0, 1].
 *
 * @param record - Record whose summary is checked
 * @param transcriptText - Candidate transcript, if the bucket has one
 * @param config - Scoring parameters
 * @returns Validation score from 0 to 1; 0 when either text is missing
 */
export function validate(
  record: Pick<MetadataRecord, 'summary'>,
  transcriptText: string | undefined,
  config: ContentValidationConfig = DEFAULT_MATCHER_CONFIG.validation
): number {
  const summary = record.summary?.trim()
  if (!summary || !transcriptText) return 0

  const { words, phrases } = extractSummaryTerms(summary, config)
  const transcript = transcriptText.toLowerCase()

  const wordScore =
    words.length > 0
      ? words.filter((word) => transcript.includes(word)).length / words.length
      : 0

  const transcriptPhrases = new Set(
    bigrams(tokenize(transcriptText, config.minWordLength))
  )
  const phraseScore =
    phrases.length > 0
      ? phrases.filter((phrase) => transcriptPhrases.has(phrase)).length /
        phrases.length
      : 0

  let score = config.wordWeight * wordScore + config.phraseWeight * phraseScore

  const summaryStart = stripPunctuation(summary)
    .slice(0, config.verbatimPrefixLength)
    .trim()
  if (summaryStart.length > 0 && stripPunctuation(transcriptText).includes(summaryStart)) {
    score += config.verbatimBonus
  }

  return Math.min(Math.max(score, 0), 1)
}

/**
 * Whether a validation score clears the acceptance bar (strictly above it).
 */
export function isValidMatch(
  score: number,
  validationAccept: number = DEFAULT_MATCHER_CONFIG.thresholds.validationAccept
): boolean {
  return score > validationAccept
}

/**
 * Re-ranks a record's fuzzy candidates by summary/transcript overlap.
 *
 * Runs only when the record has a summary and more than one fuzzy candidate;
 * otherwise the list is returned unchanged. Exact candidates are never
 * touched and never lose their lead. Validated candidates are ordered by
 * validation score, then title ratio. Rejected candidates follow them in
 * title-ratio order as `fallback` candidates, so a record whose validated
 * bucket is already taken can still be assigned by title.
 *
 * @param record - Record being matched
 * @param candidates - Ranked output of the candidate scorer
 * @param transcripts - Transcript text keyed by relative path
 * @param config - Matcher configuration
 */
export function applyContentValidation(
  record: MetadataRecord,
  candidates: readonly CandidateMatch[],
  transcripts: ReadonlyMap<string, string>,
  config: MatcherConfig = DEFAULT_MATCHER_CONFIG
): CandidateMatch[] {
  const exact = candidates.filter((c) => c.method === 'exact')
  const fuzzy = candidates.filter((c) => c.method !== 'exact')

  if (!record.summary?.trim() || fuzzy.length < 2) {
    return [...candidates]
  }

  const scored = fuzzy.map((candidate, position) => {
    const path = candidate.bucket.transcript?.path
    const text = path !== undefined ? transcripts.get(path) : undefined
    const score = validate(record, text, config.validation)
    return { candidate: { ...candidate, validationScore: score }, score, position }
  })

  const valid = scored.filter((s) =>
    isValidMatch(s.score, config.thresholds.validationAccept)
  )
  const rejected = scored.filter(
    (s) => !isValidMatch(s.score, config.thresholds.validationAccept)
  )

  valid.sort(
    (a, b) =>
      b.score - a.score ||
      b.candidate.fuzzyRatio - a.candidate.fuzzyRatio ||
      a.position - b.position
  )

  return [
    ...exact,
    ...valid.map((s) => s.candidate),
    ...rejected.map((s): CandidateMatch => ({ ...s.candidate, method: 'fallback' })),
  ]
}
