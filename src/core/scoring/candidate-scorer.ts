import type { FileBucket, FileIndex, FilePairGroup } from '../../types/files'
import type { CandidateMatch } from '../../types/match'
import type { MetadataRecord } from '../../types/record'
import type { MatcherConfig, TitleAlias } from '../../types/config'
import { DEFAULT_MATCHER_CONFIG } from '../config'
import { containsEither, sequenceRatio } from '../comparators'
import { titleKey } from '../normalizers/title'
import { isRecordingBucket } from '../index/buckets'

/**
 * Read-only view of which buckets earlier records already took.
 */
export interface ConsumptionView {
  has(bucket: FileBucket): boolean
}

/**
 * Similarity between two title keys.
 *
 * The longest-matching-blocks ratio, raised to `containmentScore` when one
 * key contains the other (a truncated title or an extra trailing word).
 *
 * @param a - First title key
 * @param b - Second title key
 * @param containmentScore - Ratio granted on containment, or null to disable
 */
export function titleSimilarity(
  a: string,
  b: string,
  containmentScore: number | null = DEFAULT_MATCHER_CONFIG.thresholds.containmentScore
): number {
  const ratio = sequenceRatio(a, b, { caseSensitive: true })
  if (containmentScore !== null && containsEither(a, b)) {
    return Math.max(ratio, containmentScore)
  }
  return ratio
}

/**
 * Comparison keys for a title: its own key first, then one per alias that
 * changes it. Empty and repeated keys are dropped.
 */
export function titleVariants(
  title: string,
  aliases: readonly TitleAlias[] = []
): string[] {
  const keys = [titleKey(title)]
  for (const alias of aliases) {
    const variant =
      typeof alias.pattern === 'string'
        ? title.split(alias.pattern).join(alias.replacement)
        : title.replace(alias.pattern, alias.replacement)
    keys.push(titleKey(variant))
  }
  return [...new Set(keys)].filter((key) => key.length > 0)
}

/**
 * Produces a record's ranked candidate buckets.
 *
 * Exact-tier candidates (normalized title, or an alias of it, equal to a
 * group key) come first in ascending duplicate order, all with ratio 1.
 * Fuzzy-tier candidates follow, keeping only ratios at or above the fuzzy
 * floor, sorted by ratio, then group key, then duplicate index. Only
 * unconsumed buckets that count as recordings under the configured policy
 * are considered.
 *
 * @param record - Record to find files for
 * @param index - File index to search
 * @param config - Matcher configuration
 * @param consumed - Buckets already assigned earlier in the run
 * @returns Candidates, best first; empty when nothing clears the floor
 */
export function scoreCandidates(
  record: MetadataRecord,
  index: Pick<FileIndex, 'groups'>,
  config: MatcherConfig = DEFAULT_MATCHER_CONFIG,
  consumed?: ConsumptionView
): CandidateMatch[] {
  const keys = titleVariants(record.title, config.aliases)
  if (keys.length === 0) return []

  const isEligible = (bucket: FileBucket) =>
    !consumed?.has(bucket) && isRecordingBucket(bucket, config.recordingPolicy)

  const toCandidates = (
    group: FilePairGroup,
    method: 'exact' | 'fuzzy',
    fuzzyRatio: number
  ): CandidateMatch[] =>
    group.buckets.filter(isEligible).map((bucket) => ({
      recordId: record.id,
      bucket,
      groupName: group.name,
      method,
      fuzzyRatio,
      hasRecording: true,
    }))

  const exact: CandidateMatch[] = []
  const exactKeys = new Set<string>()
  for (const key of keys) {
    const group = index.groups.get(key)
    if (group && !exactKeys.has(key)) {
      exactKeys.add(key)
      exact.push(...toCandidates(group, 'exact', 1))
    }
  }

  const fuzzy: CandidateMatch[] = []
  for (const group of index.groups.values()) {
    if (exactKeys.has(group.key)) continue

    const ratio = Math.max(
      ...keys.map((key) =>
        titleSimilarity(key, group.key, config.thresholds.containmentScore)
      )
    )
    if (ratio >= config.thresholds.fuzzyFloor) {
      fuzzy.push(...toCandidates(group, 'fuzzy', ratio))
    }
  }

  fuzzy.sort(
    (a, b) =>
      b.fuzzyRatio - a.fuzzyRatio ||
      compareKeys(a.bucket.groupKey, b.bucket.groupKey) ||
      a.bucket.duplicateIndex - b.bucket.duplicateIndex
  )

  return [...exact, ...fuzzy]
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
