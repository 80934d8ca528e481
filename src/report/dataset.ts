/**
 * Machine-readable assignment dataset for page generation
 * @module report/dataset
 */

import type { FileIndex } from '../types/files'
import type { MatchRun } from '../types/match'
import type { RecordId } from '../types/record'
import { DEFAULT_MATCHER_CONFIG } from '../core/config'

/**
 * One record of the dataset, with its matched files
 */
export interface DatasetEntry {
  id: RecordId
  title: string
  date?: string
  time?: string
  duration?: string
  attendee?: string
  summary?: string
  hasRecording: boolean
  /** Audio path relative to the export directory */
  audioPath?: string
  /** Transcript path relative to the export directory */
  transcriptPath?: string
  /** Leading transcript text for search indexing */
  transcriptSearch?: string
}

/**
 * Options for {@link buildAssignmentDataset}
 */
export interface DatasetOptions {
  /** Transcript characters kept for search (default: 5000) */
  excerptLength?: number
}

/**
 * Builds the per-record dataset in metadata order.
 *
 * @param run - Completed matching run
 * @param index - File index the run used; supplies transcript text
 * @param options - Excerpt length
 */
export function buildAssignmentDataset(
  run: Pick<MatchRun, 'assignments'>,
  index: Pick<FileIndex, 'transcripts'>,
  options: DatasetOptions = {}
): DatasetEntry[] {
  const excerptLength = options.excerptLength ?? DEFAULT_MATCHER_CONFIG.excerptLength

  return run.assignments.map(({ record, bucket, hasRecording }) => {
    const entry: DatasetEntry = { ...record, hasRecording }
    if (!bucket) return entry

    entry.audioPath = bucket.audio?.path
    entry.transcriptPath = bucket.transcript?.path

    const text =
      bucket.transcript !== undefined
        ? index.transcripts.get(bucket.transcript.path)
        : undefined
    if (text !== undefined) {
      entry.transcriptSearch = text.slice(0, excerptLength)
    }
    return entry
  })
}
