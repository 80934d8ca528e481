export type { RecordId, MetadataRecord, RecordWarning } from './record'
export type {
  FileKind,
  FileEntry,
  FileBucket,
  FilePairGroup,
  IndexWarning,
  FileIndex,
} from './files'
export type {
  MatchMethod,
  CandidateMatch,
  Assignment,
  AmbiguityReason,
  AmbiguousCandidate,
  AmbiguityLogEntry,
  MatchRunStats,
  MatchRun,
} from './match'
export type {
  RecordingPolicy,
  ScoreBand,
  MatchThresholds,
  ContentValidationConfig,
  FileIndexOptions,
  TitleAlias,
  MatcherConfig,
  MatcherOptions,
} from './config'
