import type { FileBucket } from './files'
import type { MetadataRecord, RecordId } from './record'

/**
 * How a candidate was found.
 *
 * - `exact`: normalized title equals the group's normalized base name
 * - `fuzzy`: similarity ratio at or above the fuzzy floor
 * - `fallback`: fuzzy candidate kept only because the record has a summary
 *   and no candidate passed content validation
 */
export type MatchMethod = 'exact' | 'fuzzy' | 'fallback'

/**
 * A (record, bucket) pairing proposed by the candidate scorer.
 */
export interface CandidateMatch {
  recordId: RecordId
  bucket: FileBucket
  /** Display name of the bucket's group */
  groupName: string
  method: MatchMethod
  /** Title similarity in [0, 1]; 1 for exact candidates */
  fuzzyRatio: number
  /** Summary/transcript overlap in [0, 1], when validation ran */
  validationScore?: number
  /** Whether the bucket counts as a recording under the configured policy */
  hasRecording: boolean
}

/**
 * Final decision for one record. `bucket` is absent for "no recording".
 */
export interface Assignment {
  record: MetadataRecord
  bucket?: FileBucket
  method: MatchMethod | 'none'
  fuzzyRatio?: number
  validationScore?: number
  hasRecording: boolean
}

/**
 * Why a record's candidates were flagged for review.
 */
export type AmbiguityReason = 'validation-band' | 'fuzzy-band'

/**
 * One scored alternative listed in an ambiguity entry.
 */
export interface AmbiguousCandidate {
  groupName: string
  duplicateIndex: number
  audioPath?: string
  transcriptPath?: string
  method: MatchMethod
  fuzzyRatio: number
  validationScore?: number
}

/**
 * Audit entry for a record whose top candidates were too close to call.
 */
export interface AmbiguityLogEntry {
  recordId: RecordId
  title: string
  reason: AmbiguityReason
  /** Top candidates in ranked order */
  candidates: AmbiguousCandidate[]
  /** Group name and duplicate index actually assigned, if any */
  chosen?: { groupName: string; duplicateIndex: number }
}

/**
 * Aggregate counts for a run.
 */
export interface MatchRunStats {
  total: number
  withRecording: number
  withoutRecording: number
  byMethod: Record<MatchMethod | 'none', number>
  ambiguous: number
}

/**
 * Everything a matching run produces.
 */
export interface MatchRun {
  assignments: Assignment[]
  ambiguityLog: AmbiguityLogEntry[]
  stats: MatchRunStats
}
