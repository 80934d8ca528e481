/**
 * Which side of a recording pair a file provides.
 */
export type FileKind = 'audio' | 'transcript'

/**
 * A single audio or transcript file found in the export directory.
 */
export interface FileEntry {
  /** Path relative to the scanned directory */
  path: string
  /** Audio or transcript, decided by extension */
  kind: FileKind
  /** Lowercased extension without the dot */
  extension: string
  /** Raw base name with extension and duplicate suffix removed */
  baseName: string
  /** 0 for the unsuffixed file, k for a " (k)" suffix */
  duplicateIndex: number
}

/**
 * The audio/transcript pair sharing one normalized base name and one
 * duplicate index. Each slot holds at most one file.
 */
export interface FileBucket {
  /** Key of the owning group */
  groupKey: string
  duplicateIndex: number
  audio?: FileEntry
  transcript?: FileEntry
}

/**
 * All files sharing a normalized base name.
 * Buckets are sorted by ascending duplicate index for sequential consumption.
 */
export interface FilePairGroup {
  /** Lowercased normalized base name used for lookup */
  key: string
  /** Normalized base name with original casing, for display */
  name: string
  buckets: FileBucket[]
}

/**
 * Anomaly recorded while building the file index.
 */
export interface IndexWarning {
  /** Offending path relative to the scanned directory */
  path: string
  code: 'no-extension' | 'empty-base-name' | 'duplicate-entry' | 'unreadable-transcript'
  message: string
}

/**
 * The fully built file index: groups plus eagerly loaded transcript text.
 */
export interface FileIndex {
  /** Scanned directory, when built from disk */
  directory?: string
  groups: Map<string, FilePairGroup>
  /** Transcript text keyed by relative path */
  transcripts: Map<string, string>
  warnings: IndexWarning[]
}
