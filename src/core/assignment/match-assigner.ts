import type { FileBucket } from '../../types/files'
import type {
  AmbiguityLogEntry,
  AmbiguityReason,
  AmbiguousCandidate,
  Assignment,
  CandidateMatch,
} from '../../types/match'
import type { MetadataRecord, RecordId } from '../../types/record'
import type { MatcherConfig, MatchThresholds } from '../../types/config'
import { DEFAULT_MATCHER_CONFIG } from '../config'
import { bucketId } from '../index/buckets'
import { MeetingMatcherError } from '../../utils/errors'

// Tolerance for comparing ratios that differ only by float rounding
const EPSILON = 1e-9

/**
 * Buckets taken during one matching run.
 *
 * Create one per run and pass it through; it is updated strictly in
 * metadata-record order, which is what keeps assignments injective.
 */
export class ConsumptionTable {
  private readonly consumed = new Map<string, RecordId>()

  /** Whether a bucket has been assigned */
  has(bucket: FileBucket): boolean {
    return this.consumed.has(bucketId(bucket))
  }

  /** Record that owns a bucket, if any */
  ownerOf(bucket: FileBucket): RecordId | undefined {
    return this.consumed.get(bucketId(bucket))
  }

  /**
   * Marks a bucket as assigned to a record.
   *
   * @throws {MeetingMatcherError} If the bucket was already consumed
   */
  consume(bucket: FileBucket, recordId: RecordId): void {
    const id = bucketId(bucket)
    const owner = this.consumed.get(id)
    if (owner !== undefined) {
      throw new MeetingMatcherError(
        `Bucket '${id}' already assigned to record ${owner}`,
        'BUCKET_ALREADY_CONSUMED',
        { bucketId: id, owner, recordId }
      )
    }
    this.consumed.set(id, recordId)
  }

  /** Number of consumed buckets */
  get size(): number {
    return this.consumed.size
  }

  /** Bucket ids mapped to the record that consumed them */
  snapshot(): Map<string, RecordId> {
    return new Map(this.consumed)
  }
}

/**
 * Decides whether a record's candidates are close enough to need review.
 *
 * Two validated scores inside the validation band flag the record. Failing
 * that, and when there is no exact candidate, the best ratios of the two
 * leading distinct groups must be within the fuzzy closeness margin. Only
 * candidates validation accepted take part in that comparison, unless it
 * accepted none. Buckets of the same group share a ratio and are resolved
 * by duplicate order, so they never count as ambiguous.
 *
 * @returns The reason, or undefined when the decision is clear
 */
export function detectAmbiguity(
  candidates: readonly CandidateMatch[],
  thresholds: MatchThresholds = DEFAULT_MATCHER_CONFIG.thresholds
): AmbiguityReason | undefined {
  if (candidates.length < 2) return undefined

  const { min, max } = thresholds.ambiguityBand
  const inBand = candidates.filter(
    (c) =>
      c.validationScore !== undefined &&
      c.validationScore >= min - EPSILON &&
      c.validationScore <= max + EPSILON
  )
  if (inBand.length >= 2) return 'validation-band'

  if (candidates.some((c) => c.method === 'exact')) return undefined

  const accepted = candidates.filter((c) => c.method === 'fuzzy')
  const contenders = accepted.length > 0 ? accepted : candidates

  const bestByGroup = new Map<string, number>()
  for (const candidate of contenders) {
    const key = candidate.bucket.groupKey
    bestByGroup.set(key, Math.max(bestByGroup.get(key) ?? 0, candidate.fuzzyRatio))
  }
  if (bestByGroup.size < 2) return undefined

  const [first, second] = [...bestByGroup.values()].sort((a, b) => b - a)
  return first - second <= thresholds.fuzzyCloseness + EPSILON
    ? 'fuzzy-band'
    : undefined
}

function describeCandidate(candidate: CandidateMatch): AmbiguousCandidate {
  return {
    groupName: candidate.groupName,
    duplicateIndex: candidate.bucket.duplicateIndex,
    audioPath: candidate.bucket.audio?.path,
    transcriptPath: candidate.bucket.transcript?.path,
    method: candidate.method,
    fuzzyRatio: candidate.fuzzyRatio,
    validationScore: candidate.validationScore,
  }
}

/**
 * Result of assigning a single record.
 */
export interface RecordAssignment {
  assignment: Assignment
  /** Present when the record's candidates were flagged for review */
  ambiguity?: AmbiguityLogEntry
}

/**
 * Assigns one record to its first unconsumed candidate and consumes that bucket.
 *
 * The ambiguity entry, when any, lists the top candidates no matter which
 * one was picked; it is an audit signal and never blocks the assignment.
 *
 * @param record - Record being assigned
 * @param candidates - Ranked candidates for the record
 * @param table - Consumption table of the current run
 * @param config - Matcher configuration
 */
export function assignRecord(
  record: MetadataRecord,
  candidates: readonly CandidateMatch[],
  table: ConsumptionTable,
  config: MatcherConfig = DEFAULT_MATCHER_CONFIG
): RecordAssignment {
  const chosen = candidates.find((c) => !table.has(c.bucket))

  let assignment: Assignment
  if (chosen) {
    table.consume(chosen.bucket, record.id)
    assignment = {
      record,
      bucket: chosen.bucket,
      method: chosen.method,
      fuzzyRatio: chosen.fuzzyRatio,
      validationScore: chosen.validationScore,
      hasRecording: chosen.hasRecording,
    }
  } else {
    assignment = { record, method: 'none', hasRecording: false }
  }

  const reason = detectAmbiguity(candidates, config.thresholds)
  if (!reason) {
    return { assignment }
  }

  return {
    assignment,
    ambiguity: {
      recordId: record.id,
      title: record.title,
      reason,
      candidates: candidates.slice(0, config.ambiguityTopK).map(describeCandidate),
      chosen: chosen
        ? { groupName: chosen.groupName, duplicateIndex: chosen.bucket.duplicateIndex }
        : undefined,
    },
  }
}

/**
 * Output of {@link assign}.
 */
export interface AssignResult {
  assignments: Assignment[]
  ambiguityLog: AmbiguityLogEntry[]
  table: ConsumptionTable
}

/**
 * Assigns every record, in metadata order, to at most one bucket.
 *
 * No bucket is ever used twice: each record takes its first candidate that
 * no earlier record consumed. Records without a usable candidate get
 * "no recording". Deterministic for identical inputs.
 *
 * @param records - Records in metadata order
 * @param candidatesPerRecord - Ranked candidates keyed by record id
 * @param config - Matcher configuration
 * @param table - Consumption table to continue from (default: a fresh one)
 */
export function assign(
  records: readonly MetadataRecord[],
  candidatesPerRecord: ReadonlyMap<RecordId, readonly CandidateMatch[]>,
  config: MatcherConfig = DEFAULT_MATCHER_CONFIG,
  table: ConsumptionTable = new ConsumptionTable()
): AssignResult {
  const assignments: Assignment[] = []
  const ambiguityLog: AmbiguityLogEntry[] = []

  for (const record of records) {
    const candidates = candidatesPerRecord.get(record.id) ?? []
    const { assignment, ambiguity } = assignRecord(record, candidates, table, config)
    assignments.push(assignment)
    if (ambiguity) ambiguityLog.push(ambiguity)
  }

  return { assignments, ambiguityLog, table }
}
