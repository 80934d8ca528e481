import type { FileIndex } from '../types/files'
import type { MetadataRecord } from '../types/record'
import type { MatcherConfig } from '../types/config'
import type { Assignment, MatchRun, MatchRunStats, CandidateMatch } from '../types/match'
import { DEFAULT_MATCHER_CONFIG } from './config'
import { scoreCandidates } from './scoring/candidate-scorer'
import { applyContentValidation } from './scoring/content-validator'
import { ConsumptionTable, assignRecord } from './assignment/match-assigner'
import { createSilentLogger, type Logger } from '../utils/logger'

/**
 * Pairs metadata records with file buckets.
 *
 * Each run walks the records in metadata order. For every record it scores
 * candidates against buckets no earlier record took, re-ranks them by summary
 * content when that can break a tie, and assigns the first free one. Runs are
 * independent: the consumption table lives only for the duration of
 * {@link RecordingMatcher.match}.
 *
 * @example
 * ```typescript
 * const matcher = MeetingMatcher.create().build()
 * const index = await buildFileIndex('./export')
 * const run = matcher.match(records, index)
 * ```
 */
export class RecordingMatcher {
  constructor(
    private readonly config: MatcherConfig = DEFAULT_MATCHER_CONFIG,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  /**
   * The configuration this matcher was built with.
   */
  getConfig(): MatcherConfig {
    return this.config
  }

  /**
   * Ranked candidates for a single record, ignoring any consumption state.
   * Useful for inspecting why a record matched the way it did.
   */
  candidatesFor(
    record: MetadataRecord,
    index: Pick<FileIndex, 'groups' | 'transcripts'>
  ): CandidateMatch[] {
    const scored = scoreCandidates(record, index, this.config)
    return applyContentValidation(record, scored, index.transcripts, this.config)
  }

  /**
   * Runs one full matching pass.
   *
   * @param records - Records in metadata order
   * @param index - File index built before the run
   */
  match(
    records: readonly MetadataRecord[],
    index: Pick<FileIndex, 'groups' | 'transcripts'>
  ): MatchRun {
    const table = new ConsumptionTable()
    const run: MatchRun = {
      assignments: [],
      ambiguityLog: [],
      stats: emptyStats(),
    }

    for (const record of records) {
      const scored = scoreCandidates(record, index, this.config, table)
      const candidates = applyContentValidation(
        record,
        scored,
        index.transcripts,
        this.config
      )
      const { assignment, ambiguity } = assignRecord(
        record,
        candidates,
        table,
        this.config
      )

      this.logDecision(assignment, candidates)
      run.assignments.push(assignment)
      if (ambiguity) {
        this.logger.info(`Ambiguous match for '${record.title}'`, {
          recordId: record.id,
          reason: ambiguity.reason,
          candidates: ambiguity.candidates.length,
        })
        run.ambiguityLog.push(ambiguity)
      }
    }

    run.stats = computeStats(run)
    return run
  }

  private logDecision(assignment: Assignment, candidates: CandidateMatch[]): void {
    const { record, bucket } = assignment
    if (!bucket) {
      this.logger.debug(`No recording for '${record.title}'`, {
        recordId: record.id,
        candidates: candidates.length,
      })
      return
    }
    this.logger.debug(`Matched '${record.title}'`, {
      recordId: record.id,
      method: assignment.method,
      group: bucket.groupKey,
      duplicateIndex: bucket.duplicateIndex,
      fuzzyRatio: assignment.fuzzyRatio,
      validationScore: assignment.validationScore,
    })
    if (assignment.method === 'fallback') {
      this.logger.warn(
        `No transcript supported the summary of '${record.title}'; assigned by title only`,
        { recordId: record.id, group: bucket.groupKey }
      )
    }
  }
}

function emptyStats(): MatchRunStats {
  return {
    total: 0,
    withRecording: 0,
    withoutRecording: 0,
    byMethod: { exact: 0, fuzzy: 0, fallback: 0, none: 0 },
    ambiguous: 0,
  }
}

/**
 * Aggregates assignment counts for a run.
 */
export function computeStats(run: Pick<MatchRun, 'assignments' | 'ambiguityLog'>): MatchRunStats {
  const stats = emptyStats()
  for (const assignment of run.assignments) {
    stats.total++
    if (assignment.hasRecording) {
      stats.withRecording++
    } else {
      stats.withoutRecording++
    }
    stats.byMethod[assignment.method]++
  }
  stats.ambiguous = run.ambiguityLog.length
  return stats
}
