import { describe, it, expect } from 'vitest'
import {
  decodeHtmlEntities,
  stripReplyPrefix,
  normalizePunctuation,
  collapseWhitespace,
  stripTrailingPunctuation,
  normalizeTitle,
  titleKey,
} from '../../src/core/normalizers/title'

describe('decodeHtmlEntities', () => {
  it('decodes named entities', () => {
    expect(decodeHtmlEntities('Q&amp;A')).toBe('Q&A')
    expect(decodeHtmlEntities('&lt;draft&gt;')).toBe('<draft>')
  })

  it('decodes decimal and hex entities', () => {
    expect(decodeHtmlEntities('Don&#39;t')).toBe("Don't")
    expect(decodeHtmlEntities('&#x41;genda')).toBe('Agenda')
  })

  it('decodes double-escaped input fully', () => {
    expect(decodeHtmlEntities('&amp;amp;')).toBe('&')
  })

  it('leaves unknown and out-of-range entities untouched', () => {
    expect(decodeHtmlEntities('&bogus;')).toBe('&bogus;')
    expect(decodeHtmlEntities('&#99999999;')).toBe('&#99999999;')
  })
})

describe('stripReplyPrefix', () => {
  it('removes a single prefix', () => {
    expect(stripReplyPrefix('Re: Team Sync')).toBe('Team Sync')
  })

  it('removes a run of prefixes in any case', () => {
    expect(stripReplyPrefix('RE:re: Budget')).toBe('Budget')
  })

  it('keeps words that merely start with re', () => {
    expect(stripReplyPrefix('Review session')).toBe('Review session')
  })
})

describe('normalizePunctuation', () => {
  it('turns a colon separator into a spaced hyphen', () => {
    expect(normalizePunctuation('Kickoff: Phase 2')).toBe('Kickoff - Phase 2')
  })

  it('keeps colons that are not separators', () => {
    expect(normalizePunctuation('Alex’s 1:1')).toBe("Alex's 1:1")
  })

  it('maps dashes and smart quotes to ASCII', () => {
    expect(normalizePunctuation('“Launch” — Retro')).toBe('"Launch" - Retro')
  })
})

describe('collapseWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(collapseWhitespace('  Team \t  Sync  ')).toBe('Team Sync')
  })
})

describe('stripTrailingPunctuation', () => {
  it('removes trailing periods, dashes and ellipses', () => {
    expect(stripTrailingPunctuation('Weekly sync...')).toBe('Weekly sync')
    expect(stripTrailingPunctuation('Agenda -')).toBe('Agenda')
    expect(stripTrailingPunctuation('Wrap up…')).toBe('Wrap up')
  })
})

describe('normalizeTitle', () => {
  it('normalizes a reply title with extra spacing', () => {
    expect(normalizeTitle('Re:  Team   Sync')).toBe('Team Sync')
  })

  it('decodes entities and unifies separators', () => {
    expect(normalizeTitle('Q&amp;A – Roadmap.')).toBe('Q&A - Roadmap')
  })

  it('matches a file name that replaced the colon with a hyphen', () => {
    expect(normalizeTitle('Kickoff: Phase 2')).toBe(normalizeTitle('Kickoff - Phase 2'))
  })

  it('preserves casing', () => {
    expect(normalizeTitle('Q1 Planning')).toBe('Q1 Planning')
  })

  it('returns an empty string for punctuation-only input', () => {
    expect(normalizeTitle('...')).toBe('')
    expect(normalizeTitle('')).toBe('')
  })

  it('is idempotent', () => {
    const samples = [
      'Re:  Team   Sync',
      'RE: re: Q&amp;amp;A: Roadmap...',
      'Kickoff:  Phase 2 —',
      '  Alex’s 1:1 “notes”  ',
      'Weekly sync :',
      'A: - B',
      'Open work session - no agenda',
      '&#82;e: Budget',
      'Launch - Retro…',
      '',
    ]
    for (const sample of samples) {
      const once = normalizeTitle(sample)
      expect(normalizeTitle(once)).toBe(once)
    }
  })
})

describe('titleKey', () => {
  it('lowercases the normalized title', () => {
    expect(titleKey('Re:  Team   Sync')).toBe('team sync')
    expect(titleKey('Team Sync')).toBe('team sync')
  })
})
