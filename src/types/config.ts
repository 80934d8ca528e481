/**
 * Which buckets count as a recording.
 *
 * - `audio`: audio alone is enough, a transcript is optional
 * - `complete`: audio and transcript must both exist at the same duplicate index
 */
export type RecordingPolicy = 'audio' | 'complete'

/**
 * Score interval in which validated candidates are flagged for review.
 */
export interface ScoreBand {
  min: number
  max: number
}

/**
 * Empirically chosen decision thresholds.
 */
export interface MatchThresholds {
  /** Minimum title similarity for a fuzzy candidate (default: 0.8) */
  fuzzyFloor: number
  /** Validation scores above this accept a candidate (default: 0.05) */
  validationAccept: number
  /** Validation scores inside this band mark a record ambiguous (default: 0.3-0.6) */
  ambiguityBand: ScoreBand
  /** Fuzzy ratios this close mark a record ambiguous (default: 0.05) */
  fuzzyCloseness: number
  /**
   * Ratio given to titles where one contains the other, or null to disable
   * (default: 0.85)
   */
  containmentScore: number | null
}

/**
 * Summary/transcript overlap scoring parameters.
 */
export interface ContentValidationConfig {
  /** Leading summary characters considered (default: 300) */
  summaryPrefixLength: number
  /** Shortest word kept after filtering (default: 4) */
  minWordLength: number
  /** Weight of the word score (default: 0.4) */
  wordWeight: number
  /** Weight of the phrase score (default: 0.6) */
  phraseWeight: number
  /** Leading summary characters checked verbatim against the transcript (default: 50) */
  verbatimPrefixLength: number
  /** Added when the verbatim prefix is found, capped at 1 (default: 0.2) */
  verbatimBonus: number
}

/**
 * Extensions recognized when scanning the export directory.
 */
export interface FileIndexOptions {
  audioExtensions: readonly string[]
  transcriptExtensions: readonly string[]
  /** Descend into sub-directories (default: false) */
  recursive: boolean
}

/**
 * Rewrites a title into a variant that is looked up in the exact tier.
 */
export interface TitleAlias {
  pattern: string | RegExp
  replacement: string
}

/**
 * Complete matcher configuration.
 */
export interface MatcherConfig {
  thresholds: MatchThresholds
  validation: ContentValidationConfig
  files: FileIndexOptions
  recordingPolicy: RecordingPolicy
  aliases: TitleAlias[]
  /** Transcript characters copied into the dataset for search (default: 5000) */
  excerptLength: number
  /** Candidates listed per ambiguity entry (default: 3) */
  ambiguityTopK: number
}

/**
 * Partial configuration accepted from callers; nested objects merge with defaults.
 */
export interface MatcherOptions {
  thresholds?: Partial<Omit<MatchThresholds, 'ambiguityBand'>> & {
    ambiguityBand?: Partial<ScoreBand>
  }
  validation?: Partial<ContentValidationConfig>
  files?: Partial<FileIndexOptions>
  recordingPolicy?: RecordingPolicy
  aliases?: TitleAlias[]
  excerptLength?: number
  ambiguityTopK?: number
}
