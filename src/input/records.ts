/**
 * Reading the scraper's meeting list into metadata records
 * @module input/records
 */

import type { MetadataRecord, RecordWarning } from '../types/record'
import { InputValidationError } from '../utils/errors'

/**
 * Optional string fields copied from each scraped entry
 */
const OPTIONAL_FIELDS = ['date', 'time', 'duration', 'attendee', 'summary'] as const

/**
 * Records accepted from the input plus anomalies found along the way
 */
export interface ParsedRecords {
  records: MetadataRecord[]
  warnings: RecordWarning[]
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Turns scraped meeting entries into metadata records.
 *
 * Entries need a non-empty `title` (the scraper's older `name` key is
 * accepted too); others are skipped with a warning. Optional fields that
 * are missing, blank or not strings become absent. Ids are the ordinal
 * among accepted records unless the entry carries a numeric `id`.
 *
 * @param input - Parsed JSON from the scraper
 * @throws {InputValidationError} If the input is not an array
 */
export function parseMetadataRecords(input: unknown): ParsedRecords {
  if (!Array.isArray(input)) {
    throw new InputValidationError('expected an array of meeting entries', {
      received: input === null ? 'null' : typeof input,
    })
  }

  const records: MetadataRecord[] = []
  const warnings: RecordWarning[] = []
  const usedIds = new Set<number>()

  input.forEach((entry: unknown, index) => {
    if (!isPlainObject(entry)) {
      warnings.push({
        index,
        code: 'invalid-entry',
        message: `Entry ${index} is not an object`,
      })
      return
    }

    const rawTitle = entry.title ?? entry.name
    const title = typeof rawTitle === 'string' ? rawTitle.trim() : ''
    if (title.length === 0) {
      warnings.push({
        index,
        code: 'missing-title',
        message: `Entry ${index} has no title`,
        field: 'title',
      })
      return
    }

    let id = records.length
    if (typeof entry.id === 'number' && Number.isInteger(entry.id) && !usedIds.has(entry.id)) {
      id = entry.id
    } else {
      while (usedIds.has(id)) id++
    }
    const record: MetadataRecord = { id, title }

    for (const field of OPTIONAL_FIELDS) {
      const value = entry[field]
      if (typeof value === 'string') {
        const trimmed = value.trim()
        if (trimmed.length > 0) record[field] = trimmed
      } else if (value !== undefined && value !== null) {
        warnings.push({
          index,
          recordId: id,
          code: 'invalid-field',
          message: `Entry ${index} has a non-string '${field}'; treated as absent`,
          field,
        })
      }
    }

    usedIds.add(id)
    records.push(record)
  })

  return { records, warnings }
}
