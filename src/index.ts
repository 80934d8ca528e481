// Main entry point
export { MeetingMatcher, MatcherBuilder } from './builder/matcher-builder'

// Core classes
export { RecordingMatcher, computeStats } from './core/matcher'

// Configuration
export {
  DEFAULT_MATCHER_CONFIG,
  resolveMatcherConfig,
  normalizeExtension,
} from './core/config'

// Comparators
export {
  sequenceRatio,
  type SequenceRatioOptions,
  containsEither,
} from './core/comparators'

// Normalizers
export {
  normalizeTitle,
  titleKey,
  decodeHtmlEntities,
  stripReplyPrefix,
  normalizePunctuation,
  collapseWhitespace,
  stripTrailingPunctuation,
} from './core/normalizers/title'

// File index
export {
  parseFileName,
  indexFiles,
  buildFileIndex,
  createFileIndex,
  type FileNameParseResult,
  type IndexedFiles,
} from './core/index/file-index-builder'
export { bucketId, isCompleteBucket, isRecordingBucket } from './core/index/buckets'

// Scoring
export {
  scoreCandidates,
  titleSimilarity,
  titleVariants,
  type ConsumptionView,
} from './core/scoring/candidate-scorer'
export {
  validate,
  isValidMatch,
  applyContentValidation,
  extractSummaryTerms,
  tokenize,
  bigrams,
  type SummaryTerms,
} from './core/scoring/content-validator'

// Assignment
export {
  ConsumptionTable,
  assign,
  assignRecord,
  detectAmbiguity,
  type AssignResult,
  type RecordAssignment,
} from './core/assignment/match-assigner'

// Input
export { parseMetadataRecords, type ParsedRecords } from './input/records'

// Reports
export {
  buildAssignmentDataset,
  type DatasetEntry,
  type DatasetOptions,
} from './report/dataset'
export {
  AuditReporter,
  tierOf,
  escapeCsvField,
  type AuditRow,
  type MatchTier,
} from './report/audit-reporter'

// Types
export type * from './types'

// Logging
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
  type ConsoleLoggerOptions,
} from './utils/logger'

// Errors
export {
  MeetingMatcherError,
  InvalidParameterError,
  ConfigurationError,
  InputValidationError,
  FileIndexError,
  isMeetingMatcherError,
} from './utils/errors'
