/**
 * Type alias for record identifiers.
 * Records are numbered by their position in the scraped metadata list.
 */
export type RecordId = number

/**
 * One meeting entry extracted upstream from the HTML export.
 * Optional fields are absent (never empty strings or sentinel values)
 * when the scraper could not find them.
 */
export interface MetadataRecord {
  /** Stable ordinal of the record in metadata order */
  id: RecordId
  /** Meeting title as shown in the export (required) */
  title: string
  /** Display date, e.g. "Friday, Mar 15, 2024" */
  date?: string
  /** Start time, e.g. "10:30 AM" */
  time?: string
  /** Human-readable duration, e.g. "45 min" */
  duration?: string
  /** Attendee or owner shown on the meeting card */
  attendee?: string
  /** Generated meeting summary, when the export carries one */
  summary?: string
}

/**
 * Anomaly recorded against a single input record.
 * Warnings never abort a run.
 */
export interface RecordWarning {
  /** Position of the entry in the raw input */
  index: number
  /** Record id, when the entry was accepted */
  recordId?: RecordId
  /** Machine-readable warning kind */
  code: 'missing-title' | 'invalid-field' | 'invalid-entry'
  /** Human-readable description */
  message: string
  /** Offending field name, when applicable */
  field?: string
}
