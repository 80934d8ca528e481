/**
 * Audit reporting for matching runs
 * @module report/audit-reporter
 */

import type { MatchMethod, MatchRun, MatchRunStats } from '../types/match'
import type { RecordId } from '../types/record'

/**
 * Tier that produced an assignment; fallback assignments count as fuzzy
 */
export type MatchTier = 'exact' | 'fuzzy' | 'none'

/**
 * One spot-check row per record
 */
export interface AuditRow {
  id: RecordId
  title: string
  audioPath?: string
  transcriptPath?: string
  fuzzyRatio?: number
  /** Present only when content validation ran for the chosen candidate */
  validationScore?: number
  hasRecording: boolean
  tier: MatchTier
  method: MatchMethod | 'none'
}

const CSV_COLUMNS = [
  'id',
  'title',
  'audioPath',
  'transcriptPath',
  'fuzzyRatio',
  'validationScore',
  'hasRecording',
  'tier',
  'method',
] as const

/**
 * Maps an assignment method onto its reporting tier
 */
export function tierOf(method: MatchMethod | 'none'): MatchTier {
  switch (method) {
    case 'exact':
      return 'exact'
    case 'fuzzy':
    case 'fallback':
      return 'fuzzy'
    case 'none':
      return 'none'
  }
}

/**
 * Quotes a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function formatScore(value: number | undefined): string {
  return value === undefined ? '' : value.toFixed(3)
}

/**
 * AuditReporter class for turning a run into human-reviewable reports
 */
export class AuditReporter {
  constructor(private readonly run: MatchRun) {}

  /**
   * One row per record, in metadata order
   */
  rows(): AuditRow[] {
    return this.run.assignments.map((assignment) => ({
      id: assignment.record.id,
      title: assignment.record.title,
      audioPath: assignment.bucket?.audio?.path,
      transcriptPath: assignment.bucket?.transcript?.path,
      fuzzyRatio: assignment.fuzzyRatio,
      validationScore: assignment.validationScore,
      hasRecording: assignment.hasRecording,
      tier: tierOf(assignment.method),
      method: assignment.method,
    }))
  }

  /**
   * Run totals
   */
  summary(): MatchRunStats {
    return this.run.stats
  }

  /**
   * Export audit rows to CSV format
   */
  exportToCsv(rows: AuditRow[] = this.rows()): string {
    const lines = rows.map((row) =>
      [
        String(row.id),
        escapeCsvField(row.title),
        escapeCsvField(row.audioPath ?? ''),
        escapeCsvField(row.transcriptPath ?? ''),
        formatScore(row.fuzzyRatio),
        formatScore(row.validationScore),
        String(row.hasRecording),
        row.tier,
        row.method,
      ].join(',')
    )

    return [CSV_COLUMNS.join(','), ...lines].join('\n')
  }

  /**
   * Export audit rows to JSON format
   */
  exportToJson(rows: AuditRow[] = this.rows()): string {
    return JSON.stringify(rows, null, 2)
  }

  /**
   * Export the ambiguity log to JSON format
   */
  exportAmbiguityLog(): string {
    return JSON.stringify(this.run.ambiguityLog, null, 2)
  }
}
