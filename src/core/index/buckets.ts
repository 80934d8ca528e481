import type { FileBucket } from '../../types/files'
import type { RecordingPolicy } from '../../types/config'

/**
 * Stable identifier of a bucket within one file index.
 */
export function bucketId(bucket: FileBucket): string {
  return `${bucket.groupKey}#${bucket.duplicateIndex}`
}

/**
 * A bucket is complete only when audio and transcript share its duplicate index.
 */
export function isCompleteBucket(bucket: FileBucket): boolean {
  return bucket.audio !== undefined && bucket.transcript !== undefined
}

/**
 * Whether a bucket counts as a recording under the given policy.
 * Transcript-only buckets never do.
 */
export function isRecordingBucket(
  bucket: FileBucket,
  policy: RecordingPolicy
): boolean {
  switch (policy) {
    case 'audio':
      return bucket.audio !== undefined
    case 'complete':
      return isCompleteBucket(bucket)
    default: {
      const _exhaustive: never = policy
      throw new Error(`Unknown recording policy: ${_exhaustive}`)
    }
  }
}
