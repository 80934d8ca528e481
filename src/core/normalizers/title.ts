/**
 * Canonicalizes meeting titles and file base names for comparison.
 * @module core/normalizers/title
 */

/**
 * Named entities that show up in scraped meeting titles.
 */
const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  ndash: '–',
  mdash: '—',
  hellip: '…',
}

const ENTITY_PATTERN = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi

/**
 * Decodes HTML entities, repeating until none remain so that
 * double-escaped input such as `&amp;amp;` decodes fully.
 * Unknown or out-of-range entities are left untouched.
 *
 * @example
 * ```typescript
 * decodeHtmlEntities('Q&amp;A') // 'Q&A'
 * decodeHtmlEntities('Don&#39;t') // "Don't"
 * decodeHtmlEntities('&amp;amp;') // '&'
 * ```
 */
export function decodeHtmlEntities(value: string): string {
  let current = value
  for (;;) {
    const next = current.replace(ENTITY_PATTERN, decodeEntity)
    if (next === current) return current
    current = next
  }
}

function decodeEntity(match: string, body: string): string {
  if (body.startsWith('#')) {
    const codePoint =
      body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10)
    if (!Number.isFinite(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
      return match
    }
    return String.fromCodePoint(codePoint)
  }
  return NAMED_ENTITIES[body.toLowerCase()] ?? match
}

/**
 * Removes any leading run of "Re:" tokens (case-insensitive).
 *
 * @example
 * ```typescript
 * stripReplyPrefix('Re: Team Sync') // 'Team Sync'
 * stripReplyPrefix('RE:re: Budget') // 'Budget'
 * ```
 */
export function stripReplyPrefix(value: string): string {
  return value.replace(/^\s*(?:re:\s*)+/i, '')
}

/**
 * Maps typographic punctuation onto ASCII and unifies title separators.
 * Smart quotes become straight quotes, en/em dashes become hyphens, and a
 * colon or spaced hyphen between words becomes `" - "`, which is how export
 * tools write a colon into a file name.
 *
 * @example
 * ```typescript
 * normalizePunctuation('Kickoff: Phase 2') // 'Kickoff - Phase 2'
 * normalizePunctuation('Alex’s 1:1') // "Alex's 1:1"
 * ```
 */
export function normalizePunctuation(value: string): string {
  return value
    .normalize('NFC')
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, '-')
    .replace(/\s*:\s+/g, ' - ')
    .replace(/\s+-\s+/g, ' - ')
}

/**
 * Collapses whitespace runs (including non-breaking spaces) and trims.
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/**
 * Removes trailing periods, colons, dashes and ellipses.
 *
 * @example
 * ```typescript
 * stripTrailingPunctuation('Weekly sync...') // 'Weekly sync'
 * stripTrailingPunctuation('Agenda -') // 'Agenda'
 * ```
 */
export function stripTrailingPunctuation(value: string): string {
  return value.replace(/[\s.:\-…]+$/, '')
}

/**
 * Canonicalizes a title or file base name. Total and idempotent:
 * `normalizeTitle(normalizeTitle(x)) === normalizeTitle(x)` for every string.
 *
 * Casing is preserved; use {@link titleKey} for comparisons.
 *
 * @example
 * ```typescript
 * normalizeTitle('Re:  Team   Sync') // 'Team Sync'
 * normalizeTitle('Q&amp;A – Roadmap.') // 'Q&A - Roadmap'
 * ```
 */
export function normalizeTitle(raw: string): string {
  let value = decodeHtmlEntities(raw)
  value = stripReplyPrefix(value)
  value = normalizePunctuation(value)
  value = collapseWhitespace(value)
  return stripTrailingPunctuation(value)
}

/**
 * Comparison key for a title: the normalized title, lowercased.
 */
export function titleKey(raw: string): string {
  return normalizeTitle(raw).toLowerCase()
}
