import { describe, it, expect } from 'vitest'
import { MeetingMatcher, MatcherBuilder } from '../../src/builder/matcher-builder'
import { RecordingMatcher } from '../../src/core/matcher'
import { DEFAULT_MATCHER_CONFIG, resolveMatcherConfig } from '../../src/core/config'
import { createFileIndex } from '../../src/core/index/file-index-builder'
import { ConfigurationError } from '../../src/utils/errors'
import { createRecord } from '../fixtures/meetings'

describe('resolveMatcherConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveMatcherConfig()).toEqual(DEFAULT_MATCHER_CONFIG)
  })

  it('merges a partial ambiguity band with the defaults', () => {
    const config = resolveMatcherConfig({ thresholds: { ambiguityBand: { max: 0.5 } } })
    expect(config.thresholds.ambiguityBand).toEqual({ min: 0.3, max: 0.5 })
    expect(config.thresholds.fuzzyFloor).toBe(0.8)
  })

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => resolveMatcherConfig({ thresholds: { fuzzyFloor: 1.5 } })).toThrow(
      ConfigurationError
    )
    expect(() => resolveMatcherConfig({ thresholds: { fuzzyFloor: 1.5 } })).toThrow(
      "Invalid parameter 'thresholds.fuzzyFloor': must be between 0 and 1 (inclusive)"
    )
  })

  it('rejects an empty ambiguity band', () => {
    expect(() =>
      resolveMatcherConfig({ thresholds: { ambiguityBand: { min: 0.6, max: 0.6 } } })
    ).toThrow(ConfigurationError)
  })

  it('rejects weights that do not sum to 1', () => {
    expect(() =>
      resolveMatcherConfig({ validation: { wordWeight: 0.5, phraseWeight: 0.6 } })
    ).toThrow(ConfigurationError)
  })

  it('accepts other weights that sum to 1', () => {
    const config = resolveMatcherConfig({ validation: { wordWeight: 0.7, phraseWeight: 0.3 } })
    expect(config.validation.wordWeight).toBe(0.7)
  })

  it('rejects an extension listed as both audio and transcript', () => {
    expect(() => resolveMatcherConfig({ files: { transcriptExtensions: ['.MP3'] } })).toThrow(
      'Extensions cannot be both audio and transcript: mp3'
    )
  })

  it('rejects empty extension lists', () => {
    expect(() => resolveMatcherConfig({ files: { audioExtensions: [] } })).toThrow(
      ConfigurationError
    )
  })

  it('rejects a non-positive excerpt length', () => {
    expect(() => resolveMatcherConfig({ excerptLength: 0 })).toThrow(ConfigurationError)
  })

  it('does not share alias arrays with the caller', () => {
    const aliases = [{ pattern: 'x', replacement: 'y' }]
    const config = resolveMatcherConfig({ aliases })
    aliases.push({ pattern: 'a', replacement: 'b' })
    expect(config.aliases).toHaveLength(1)
  })
})

describe('MatcherBuilder', () => {
  it('creates a builder from the entry point', () => {
    expect(MeetingMatcher.create()).toBeInstanceOf(MatcherBuilder)
  })

  it('builds a matcher with the default configuration', () => {
    const matcher = MeetingMatcher.create().build()
    expect(matcher).toBeInstanceOf(RecordingMatcher)
    expect(matcher.getConfig()).toEqual(DEFAULT_MATCHER_CONFIG)
  })

  it('merges repeated threshold calls', () => {
    const config = MeetingMatcher.create()
      .thresholds({ fuzzyFloor: 0.9 })
      .thresholds({ ambiguityBand: { min: 0.2 } })
      .buildConfig()

    expect(config.thresholds.fuzzyFloor).toBe(0.9)
    expect(config.thresholds.ambiguityBand).toEqual({ min: 0.2, max: 0.6 })
  })

  it('sets validation, file and policy options', () => {
    const config = MeetingMatcher.create()
      .validation({ summaryPrefixLength: 200 })
      .files({ recursive: true })
      .recordingPolicy('complete')
      .excerptLength(1000)
      .ambiguityTopK(5)
      .buildConfig()

    expect(config.validation.summaryPrefixLength).toBe(200)
    expect(config.validation.minWordLength).toBe(4)
    expect(config.files.recursive).toBe(true)
    expect(config.files.audioExtensions).toEqual(DEFAULT_MATCHER_CONFIG.files.audioExtensions)
    expect(config.recordingPolicy).toBe('complete')
    expect(config.excerptLength).toBe(1000)
    expect(config.ambiguityTopK).toBe(5)
  })

  it('applies aliases when matching', () => {
    const matcher = MeetingMatcher.create()
      .alias(/^Open working session$/i, 'Open work session - no agenda')
      .build()
    const index = createFileIndex(['Open work session - no agenda.mp3'])

    const run = matcher.match([createRecord(0, 'Open Working Session')], index)

    expect(run.assignments[0].method).toBe('exact')
  })

  it('validates on build', () => {
    expect(() => MeetingMatcher.create().thresholds({ fuzzyCloseness: -1 }).build()).toThrow(
      ConfigurationError
    )
  })

  it('creates a matcher from an options object', () => {
    const matcher = MeetingMatcher.fromOptions({ recordingPolicy: 'complete' })
    expect(matcher.getConfig().recordingPolicy).toBe('complete')
  })
})
