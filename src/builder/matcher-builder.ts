import type {
  ContentValidationConfig,
  FileIndexOptions,
  MatcherConfig,
  MatcherOptions,
  RecordingPolicy,
} from '../types/config'
import { RecordingMatcher } from '../core/matcher'
import { resolveMatcherConfig } from '../core/config'
import type { Logger } from '../utils/logger'

/**
 * Fluent builder for configuring and creating a RecordingMatcher.
 *
 * @example
 * ```typescript
 * const matcher = MeetingMatcher.create()
 *   .thresholds({ fuzzyFloor: 0.85, ambiguityBand: { max: 0.5 } })
 *   .alias(' - 60 Minutes Call', '')
 *   .recordingPolicy('complete')
 *   .logger(createConsoleLogger({ debug: true }))
 *   .build()
 * ```
 */
export class MatcherBuilder {
  private options: MatcherOptions = {}
  private matcherLogger?: Logger

  /**
   * Override decision thresholds. Unset values keep their defaults.
   *
   * @param config - Threshold overrides
   * @returns This builder for chaining
   */
  thresholds(config: NonNullable<MatcherOptions['thresholds']>): this {
    this.options.thresholds = {
      ...this.options.thresholds,
      ...config,
      ambiguityBand: {
        ...this.options.thresholds?.ambiguityBand,
        ...config.ambiguityBand,
      },
    }
    return this
  }

  /**
   * Override summary/transcript scoring parameters.
   *
   * @param config - Validation overrides
   * @returns This builder for chaining
   */
  validation(config: Partial<ContentValidationConfig>): this {
    this.options.validation = { ...this.options.validation, ...config }
    return this
  }

  /**
   * Override the recognized audio and transcript extensions.
   *
   * @param config - File index overrides
   * @returns This builder for chaining
   */
  files(config: Partial<FileIndexOptions>): this {
    this.options.files = { ...this.options.files, ...config }
    return this
  }

  /**
   * Choose which buckets count as recordings.
   *
   * @param policy - `'audio'` or `'complete'`
   * @returns This builder for chaining
   */
  recordingPolicy(policy: RecordingPolicy): this {
    this.options.recordingPolicy = policy
    return this
  }

  /**
   * Add a title rewrite whose result is also looked up in the exact tier.
   * String patterns replace every occurrence.
   *
   * @returns This builder for chaining
   *
   * @example
   * ```typescript
   * .alias('Open working session', 'Open work session - no agenda')
   * .alias(/60 Minutes? Call/i, '60 Min Call')
   * ```
   */
  alias(pattern: string | RegExp, replacement: string): this {
    this.options.aliases = [...(this.options.aliases ?? []), { pattern, replacement }]
    return this
  }

  /**
   * Set how many transcript characters go into the dataset's search excerpt.
   *
   * @returns This builder for chaining
   */
  excerptLength(length: number): this {
    this.options.excerptLength = length
    return this
  }

  /**
   * Set how many candidates an ambiguity entry lists.
   *
   * @returns This builder for chaining
   */
  ambiguityTopK(count: number): this {
    this.options.ambiguityTopK = count
    return this
  }

  /**
   * Set the logger receiving per-record diagnostics.
   *
   * @returns This builder for chaining
   */
  logger(logger: Logger): this {
    this.matcherLogger = logger
    return this
  }

  /**
   * Resolve and validate the configuration without creating a matcher.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  buildConfig(): MatcherConfig {
    return resolveMatcherConfig(this.options)
  }

  /**
   * Create the matcher.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  build(): RecordingMatcher {
    return new RecordingMatcher(this.buildConfig(), this.matcherLogger)
  }
}

/**
 * Entry point for the fluent API.
 *
 * @example
 * ```typescript
 * const matcher = MeetingMatcher.create().build()
 * ```
 */
export const MeetingMatcher = {
  /**
   * Create a new matcher builder.
   */
  create(): MatcherBuilder {
    return new MatcherBuilder()
  },

  /**
   * Create a matcher directly from an options object.
   */
  fromOptions(options: MatcherOptions, logger?: Logger): RecordingMatcher {
    return new RecordingMatcher(resolveMatcherConfig(options), logger)
  },
}
