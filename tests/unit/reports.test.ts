import { describe, it, expect } from 'vitest'
import { AuditReporter, escapeCsvField, tierOf } from '../../src/report/audit-reporter'
import { buildAssignmentDataset } from '../../src/report/dataset'
import { computeStats } from '../../src/core/matcher'
import type { MatchRun } from '../../src/types/match'
import { createBucket, createRecord } from '../fixtures/meetings'

function sampleRun(): MatchRun {
  const partial: Omit<MatchRun, 'stats'> = {
    assignments: [
      {
        record: createRecord(0, 'Team Sync', { summary: 'Weekly check-in' }),
        bucket: createBucket('Team Sync'),
        method: 'exact',
        fuzzyRatio: 1,
        hasRecording: true,
      },
      {
        record: createRecord(1, 'Budget, Q3 "final"'),
        bucket: createBucket('Budget Q3 final', 0, { transcript: false }),
        method: 'fallback',
        fuzzyRatio: 0.8234,
        validationScore: 0,
        hasRecording: true,
      },
      {
        record: createRecord(2, 'Retro'),
        method: 'none',
        hasRecording: false,
      },
    ],
    ambiguityLog: [
      {
        recordId: 1,
        title: 'Budget, Q3 "final"',
        reason: 'fuzzy-band',
        candidates: [],
      },
    ],
  }
  return { ...partial, stats: computeStats(partial) }
}

describe('tierOf', () => {
  it('reports fallback assignments as fuzzy', () => {
    expect(tierOf('exact')).toBe('exact')
    expect(tierOf('fuzzy')).toBe('fuzzy')
    expect(tierOf('fallback')).toBe('fuzzy')
    expect(tierOf('none')).toBe('none')
  })
})

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('Team Sync')).toBe('Team Sync')
  })

  it('quotes values with delimiters and doubles quotes', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"')
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""')
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"')
  })
})

describe('computeStats', () => {
  it('counts assignments by outcome and method', () => {
    expect(sampleRun().stats).toEqual({
      total: 3,
      withRecording: 2,
      withoutRecording: 1,
      byMethod: { exact: 1, fuzzy: 0, fallback: 1, none: 1 },
      ambiguous: 1,
    })
  })
})

describe('AuditReporter', () => {
  it('builds one row per record', () => {
    const rows = new AuditReporter(sampleRun()).rows()

    expect(rows[1]).toEqual({
      id: 1,
      title: 'Budget, Q3 "final"',
      audioPath: 'Budget Q3 final.mp3',
      transcriptPath: undefined,
      fuzzyRatio: 0.8234,
      validationScore: 0,
      hasRecording: true,
      tier: 'fuzzy',
      method: 'fallback',
    })
  })

  it('exports CSV with a header and escaped fields', () => {
    const csv = new AuditReporter(sampleRun()).exportToCsv()

    expect(csv.split('\n')).toEqual([
      'id,title,audioPath,transcriptPath,fuzzyRatio,validationScore,hasRecording,tier,method',
      '0,Team Sync,Team Sync.mp3,Team Sync.txt,1.000,,true,exact,exact',
      '1,"Budget, Q3 ""final""",Budget Q3 final.mp3,,0.823,0.000,true,fuzzy,fallback',
      '2,Retro,,,,,false,none,none',
    ])
  })

  it('exports rows as JSON', () => {
    const reporter = new AuditReporter(sampleRun())
    const parsed: unknown = JSON.parse(reporter.exportToJson())

    expect(Array.isArray(parsed) && parsed.length).toBe(3)
  })

  it('exports the ambiguity log', () => {
    const reporter = new AuditReporter(sampleRun())

    expect(JSON.parse(reporter.exportAmbiguityLog())).toEqual([
      { recordId: 1, title: 'Budget, Q3 "final"', reason: 'fuzzy-band', candidates: [] },
    ])
  })

  it('returns the run totals', () => {
    expect(new AuditReporter(sampleRun()).summary().withRecording).toBe(2)
  })
})

describe('buildAssignmentDataset', () => {
  const transcripts = new Map([['Team Sync.txt', 'Team sync notes for the week']])

  it('adds file paths and a transcript excerpt', () => {
    const dataset = buildAssignmentDataset(sampleRun(), { transcripts }, { excerptLength: 9 })

    expect(dataset[0]).toEqual({
      id: 0,
      title: 'Team Sync',
      summary: 'Weekly check-in',
      hasRecording: true,
      audioPath: 'Team Sync.mp3',
      transcriptPath: 'Team Sync.txt',
      transcriptSearch: 'Team sync',
    })
  })

  it('leaves the excerpt out when the bucket has no transcript', () => {
    const dataset = buildAssignmentDataset(sampleRun(), { transcripts })

    expect(dataset[1]).toEqual({
      id: 1,
      title: 'Budget, Q3 "final"',
      hasRecording: true,
      audioPath: 'Budget Q3 final.mp3',
    })
  })

  it('marks records without a match', () => {
    const dataset = buildAssignmentDataset(sampleRun(), { transcripts })
    expect(dataset[2]).toEqual({ id: 2, title: 'Retro', hasRecording: false })
  })
})
