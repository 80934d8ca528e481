/**
 * Options for sequence ratio comparison.
 */
export interface SequenceRatioOptions {
  /** Whether string comparison should be case-sensitive (default: false) */
  caseSensitive?: boolean
  /** Whether to normalize whitespace before comparison (default: true) */
  normalizeWhitespace?: boolean
}

/**
 * Calculates the longest-matching-blocks similarity ratio between two values.
 *
 * The ratio follows Ratcliff/Obershelp pattern matching: find the longest
 * common substring, recurse on the pieces to its left and right, and count
 * every matched character. The result is `2 * matches / (|a| + |b|)`.
 * Block selection depends on argument order, so the ratio is computed both
 * ways and the larger value returned, which makes the comparison symmetric.
 *
 * @param a - First value to compare
 * @param b - Second value to compare
 * @param options - Comparison options
 * @returns Similarity score from 0 to 1
 *
 * @example
 * ```typescript
 * sequenceRatio('team sync', 'team sync')      // 1.0
 * sequenceRatio('abcd', 'bcde')                // 0.75
 * sequenceRatio('Team Sync', 'team sync')      // 1.0 (case-insensitive by default)
 * ```
 */
export function sequenceRatio(
  a: unknown,
  b: unknown,
  options: SequenceRatioOptions = {}
): number {
  const { caseSensitive = false, normalizeWhitespace = true } = options

  // Handle null/undefined
  if (a == null && b == null) return 1
  if (a == null || b == null) return 0

  let strA = String(a)
  let strB = String(b)

  if (!caseSensitive) {
    strA = strA.toLowerCase()
    strB = strB.toLowerCase()
  }

  if (normalizeWhitespace) {
    strA = strA.replace(/\s+/g, ' ').trim()
    strB = strB.replace(/\s+/g, ' ').trim()
  }

  if (strA.length === 0 && strB.length === 0) return 1
  if (strA.length === 0 || strB.length === 0) return 0
  if (strA === strB) return 1

  const total = strA.length + strB.length
  const forward = (2 * countMatchingCharacters(strA, strB)) / total
  const backward = (2 * countMatchingCharacters(strB, strA)) / total
  return Math.max(forward, backward)
}

/**
 * Returns true when one non-empty string contains the other.
 *
 * @example
 * ```typescript
 * containsEither('weekly sync', 'weekly sync notes') // true
 * containsEither('', 'anything')                     // false
 * ```
 */
export function containsEither(a: string, b: string): boolean {
  if (a.length === 0 || b.length === 0) return false
  return a.includes(b) || b.includes(a)
}

/**
 * Sums the sizes of all matching blocks between two strings.
 * @internal
 */
function countMatchingCharacters(a: string, b: string): number {
  let matches = 0
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ]

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [aLo, aHi, bLo, bHi] = range
    const [i, j, size] = findLongestMatch(a, b, aLo, aHi, bLo, bHi)
    if (size === 0) continue

    matches += size
    if (aLo < i && bLo < j) {
      pending.push([aLo, i, bLo, j])
    }
    if (i + size < aHi && j + size < bHi) {
      pending.push([i + size, aHi, j + size, bHi])
    }
  }

  return matches
}

/**
 * Finds the longest common substring of `a[aLo:aHi]` and `b[bLo:bHi]`.
 * Ties go to the block that starts earliest in `a`, then earliest in `b`.
 * @internal
 */
function findLongestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): [number, number, number] {
  let bestI = aLo
  let bestJ = bLo
  let bestSize = 0

  // Length of the common run ending at (i - 1, j) for the previous row
  let previous = new Map<number, number>()

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>()
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue
      const size = (previous.get(j - 1) ?? 0) + 1
      current.set(j, size)
      if (size > bestSize) {
        bestI = i - size + 1
        bestJ = j - size + 1
        bestSize = size
      }
    }
    previous = current
  }

  return [bestI, bestJ, bestSize]
}
