import type { MatcherConfig, MatcherOptions } from '../types/config'
import {
  ConfigurationError,
  requireInRange,
  requireLessThan,
  requireNonEmptyArray,
  requireOneOf,
  requirePositive,
} from '../utils/errors'

/**
 * Default matcher configuration.
 *
 * The thresholds were tuned by hand against a real export and are not
 * derived from anything; override them through {@link resolveMatcherConfig}
 * or the builder rather than editing the scoring code.
 */
export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  thresholds: {
    fuzzyFloor: 0.8,
    validationAccept: 0.05,
    ambiguityBand: { min: 0.3, max: 0.6 },
    fuzzyCloseness: 0.05,
    containmentScore: 0.85,
  },
  validation: {
    summaryPrefixLength: 300,
    minWordLength: 4,
    wordWeight: 0.4,
    phraseWeight: 0.6,
    verbatimPrefixLength: 50,
    verbatimBonus: 0.2,
  },
  files: {
    audioExtensions: ['mp3', 'm4a', 'wav', 'ogg', 'aac'],
    transcriptExtensions: ['txt'],
    recursive: false,
  },
  recordingPolicy: 'audio',
  aliases: [],
  excerptLength: 5000,
  ambiguityTopK: 3,
}

/**
 * Merges caller options over the defaults and validates the result.
 *
 * @throws {ConfigurationError} If thresholds are out of range or inconsistent
 */
export function resolveMatcherConfig(options: MatcherOptions = {}): MatcherConfig {
  const defaults = DEFAULT_MATCHER_CONFIG
  const config: MatcherConfig = {
    thresholds: {
      ...defaults.thresholds,
      ...options.thresholds,
      ambiguityBand: {
        ...defaults.thresholds.ambiguityBand,
        ...options.thresholds?.ambiguityBand,
      },
    },
    validation: { ...defaults.validation, ...options.validation },
    files: { ...defaults.files, ...options.files },
    recordingPolicy: options.recordingPolicy ?? defaults.recordingPolicy,
    aliases: [...(options.aliases ?? defaults.aliases)],
    excerptLength: options.excerptLength ?? defaults.excerptLength,
    ambiguityTopK: options.ambiguityTopK ?? defaults.ambiguityTopK,
  }

  try {
    validateMatcherConfig(config)
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(message, undefined, { cause: error })
  }

  return config
}

function validateMatcherConfig(config: MatcherConfig): void {
  const { thresholds, validation, files } = config

  requireInRange(thresholds.fuzzyFloor, 0, 1, 'thresholds.fuzzyFloor')
  requireInRange(thresholds.validationAccept, 0, 1, 'thresholds.validationAccept')
  requireInRange(thresholds.ambiguityBand.min, 0, 1, 'thresholds.ambiguityBand.min')
  requireInRange(thresholds.ambiguityBand.max, 0, 1, 'thresholds.ambiguityBand.max')
  requireLessThan(
    thresholds.ambiguityBand.min,
    thresholds.ambiguityBand.max,
    'thresholds.ambiguityBand.min',
    'thresholds.ambiguityBand.max'
  )
  requireInRange(thresholds.fuzzyCloseness, 0, 1, 'thresholds.fuzzyCloseness')
  if (thresholds.containmentScore !== null) {
    requireInRange(thresholds.containmentScore, 0, 1, 'thresholds.containmentScore')
  }

  requirePositive(validation.summaryPrefixLength, 'validation.summaryPrefixLength')
  requirePositive(validation.minWordLength, 'validation.minWordLength')
  requireInRange(validation.wordWeight, 0, 1, 'validation.wordWeight')
  requireInRange(validation.phraseWeight, 0, 1, 'validation.phraseWeight')
  if (Math.abs(validation.wordWeight + validation.phraseWeight - 1) > 1e-9) {
    throw new ConfigurationError(
      `validation.wordWeight (${validation.wordWeight}) and validation.phraseWeight (${validation.phraseWeight}) must sum to 1`,
      'validation'
    )
  }
  requirePositive(validation.verbatimPrefixLength, 'validation.verbatimPrefixLength')
  requireInRange(validation.verbatimBonus, 0, 1, 'validation.verbatimBonus')

  requireNonEmptyArray(files.audioExtensions, 'files.audioExtensions')
  requireNonEmptyArray(files.transcriptExtensions, 'files.transcriptExtensions')
  const audio = new Set(files.audioExtensions.map(normalizeExtension))
  const shared = files.transcriptExtensions
    .map(normalizeExtension)
    .filter((ext) => audio.has(ext))
  if (shared.length > 0) {
    throw new ConfigurationError(
      `Extensions cannot be both audio and transcript: ${shared.join(', ')}`,
      'files'
    )
  }

  requireOneOf(config.recordingPolicy, ['audio', 'complete'] as const, 'recordingPolicy')
  requirePositive(config.excerptLength, 'excerptLength')
  requirePositive(config.ambiguityTopK, 'ambiguityTopK')
}

/**
 * Lowercases an extension and drops a leading dot.
 */
export function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, '').toLowerCase()
}
