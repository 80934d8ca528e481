import { readFile, stat } from 'fs/promises'
import { join, posix } from 'path'
import fg from 'fast-glob'
import type {
  FileEntry,
  FileIndex,
  FileKind,
  FilePairGroup,
  IndexWarning,
} from '../../types/files'
import type { FileIndexOptions } from '../../types/config'
import { DEFAULT_MATCHER_CONFIG, normalizeExtension } from '../config'
import { normalizeTitle, titleKey } from '../normalizers/title'
import { FileIndexError } from '../../utils/errors'
import { createSilentLogger, type Logger } from '../../utils/logger'

/**
 * Outcome of parsing one file name.
 *
 * - `parsed`: an audio or transcript file
 * - `ignored`: an extension that is neither audio nor transcript
 * - `invalid`: no extension or no usable base name
 */
export type FileNameParseResult =
  | { status: 'parsed'; entry: FileEntry }
  | { status: 'ignored'; extension: string }
  | { status: 'invalid'; warning: IndexWarning }

/**
 * Groups and warnings produced from a list of paths.
 */
export interface IndexedFiles {
  groups: Map<string, FilePairGroup>
  warnings: IndexWarning[]
}

const DUPLICATE_SUFFIX = /^(.*?)\s*\((\d+)\)$/

/**
 * Splits a file name into base name, extension and duplicate index.
 *
 * The export tool appends `" (k)"` (sometimes without the space) to repeated
 * names; that suffix becomes the duplicate index and is removed from the base
 * name.
 *
 * @param path - Path relative to the scanned directory, `/`-separated
 * @param options - Recognized extensions
 *
 * @example
 * ```typescript
 * parseFileName('Team Sync (2).mp3', options)
 * // { status: 'parsed', entry: { baseName: 'Team Sync', duplicateIndex: 2, kind: 'audio', ... } }
 * ```
 */
export function parseFileName(
  path: string,
  options: Pick<FileIndexOptions, 'audioExtensions' | 'transcriptExtensions'>
): FileNameParseResult {
  const name = posix.basename(path)
  const dot = name.lastIndexOf('.')

  if (dot === -1) {
    return {
      status: 'invalid',
      warning: {
        path,
        code: 'no-extension',
        message: `Skipped '${path}': file has no extension`,
      },
    }
  }

  const extension = normalizeExtension(name.slice(dot + 1))
  const kind = classifyExtension(extension, options)
  if (!kind) {
    return { status: 'ignored', extension }
  }

  const stem = name.slice(0, dot)
  const suffix = DUPLICATE_SUFFIX.exec(stem)
  const baseName = (suffix ? suffix[1] : stem).trim()
  const duplicateIndex = suffix ? parseInt(suffix[2], 10) : 0

  if (titleKey(baseName).length === 0) {
    return {
      status: 'invalid',
      warning: {
        path,
        code: 'empty-base-name',
        message: `Skipped '${path}': no base name left after normalization`,
      },
    }
  }

  return {
    status: 'parsed',
    entry: { path, kind, extension, baseName, duplicateIndex },
  }
}

function classifyExtension(
  extension: string,
  options: Pick<FileIndexOptions, 'audioExtensions' | 'transcriptExtensions'>
): FileKind | undefined {
  if (options.audioExtensions.some((ext) => normalizeExtension(ext) === extension)) {
    return 'audio'
  }
  if (options.transcriptExtensions.some((ext) => normalizeExtension(ext) === extension)) {
    return 'transcript'
  }
  return undefined
}

/**
 * Groups audio and transcript paths by normalized base name.
 *
 * Paths are processed in sorted order so results do not depend on directory
 * listing order. Within a group each bucket holds at most one audio and one
 * transcript file for its duplicate index; a transcript at index 0 never
 * pairs with audio at index 1. When two files claim the same slot the first
 * one wins and the other is reported.
 *
 * @param paths - Paths relative to the export directory
 * @param options - Recognized extensions
 */
export function indexFiles(
  paths: readonly string[],
  options: Pick<FileIndexOptions, 'audioExtensions' | 'transcriptExtensions'> = DEFAULT_MATCHER_CONFIG.files,
  logger: Logger = createSilentLogger()
): IndexedFiles {
  const groups = new Map<string, FilePairGroup>()
  const warnings: IndexWarning[] = []

  for (const path of [...paths].sort()) {
    const result = parseFileName(path, options)

    if (result.status === 'ignored') {
      logger.debug(`Ignoring '${path}'`, { extension: result.extension })
      continue
    }
    if (result.status === 'invalid') {
      warnings.push(result.warning)
      continue
    }

    const { entry } = result
    const key = titleKey(entry.baseName)
    let group = groups.get(key)
    if (!group) {
      group = { key, name: normalizeTitle(entry.baseName), buckets: [] }
      groups.set(key, group)
    }

    let bucket = group.buckets.find((b) => b.duplicateIndex === entry.duplicateIndex)
    if (!bucket) {
      bucket = { groupKey: key, duplicateIndex: entry.duplicateIndex }
      group.buckets.push(bucket)
    }

    const existing = bucket[entry.kind]
    if (existing) {
      warnings.push({
        path,
        code: 'duplicate-entry',
        message: `Skipped '${path}': ${entry.kind} slot already taken by '${existing.path}'`,
      })
      continue
    }
    bucket[entry.kind] = entry
  }

  for (const group of groups.values()) {
    group.buckets.sort((a, b) => a.duplicateIndex - b.duplicateIndex)
  }

  return { groups, warnings }
}

/**
 * Scans an export directory and builds the file index.
 *
 * This is the only I/O of a matching run: the directory listing and every
 * transcript are read here, up front, so that scoring and assignment work
 * purely in memory. Unreadable transcripts are recorded as warnings.
 *
 * @param directory - Export directory to scan
 * @param options - Extension and recursion overrides
 * @param logger - Receives per-file diagnostics
 * @throws {FileIndexError} If the directory does not exist or cannot be listed
 */
export async function buildFileIndex(
  directory: string,
  options: Partial<FileIndexOptions> = {},
  logger: Logger = createSilentLogger()
): Promise<FileIndex> {
  const resolved: FileIndexOptions = { ...DEFAULT_MATCHER_CONFIG.files, ...options }

  let paths: string[]
  try {
    const info = await stat(directory)
    if (!info.isDirectory()) {
      throw new FileIndexError(directory, 'not a directory')
    }
    paths = await fg(resolved.recursive ? '**/*' : '*', {
      cwd: directory,
      onlyFiles: true,
      dot: false,
    })
  } catch (error) {
    if (error instanceof FileIndexError) throw error
    throw new FileIndexError(
      directory,
      error instanceof Error ? error.message : String(error)
    )
  }

  const { groups, warnings } = indexFiles(paths, resolved, logger)
  const transcripts = await loadTranscripts(directory, groups, warnings)

  for (const warning of warnings) {
    logger.warn(warning.message, { path: warning.path, code: warning.code })
  }
  logger.debug(`Indexed ${groups.size} file groups`, {
    directory,
    files: paths.length,
    transcripts: transcripts.size,
  })

  return { directory, groups, transcripts, warnings }
}

async function loadTranscripts(
  directory: string,
  groups: Map<string, FilePairGroup>,
  warnings: IndexWarning[]
): Promise<Map<string, string>> {
  const entries: FileEntry[] = []
  for (const group of groups.values()) {
    for (const bucket of group.buckets) {
      if (bucket.transcript) entries.push(bucket.transcript)
    }
  }

  const results = await Promise.all(
    entries.map(async (entry): Promise<{ entry: FileEntry; text: string } | { entry: FileEntry; error: string }> => {
      try {
        const text = await readFile(join(directory, entry.path), 'utf8')
        return { entry, text }
      } catch (error) {
        return { entry, error: error instanceof Error ? error.message : String(error) }
      }
    })
  )

  const transcripts = new Map<string, string>()
  for (const result of results) {
    if ('text' in result) {
      transcripts.set(result.entry.path, result.text)
    } else {
      warnings.push({
        path: result.entry.path,
        code: 'unreadable-transcript',
        message: `Could not read transcript '${result.entry.path}': ${result.error}`,
      })
    }
  }
  return transcripts
}

/**
 * Builds an in-memory index from paths and transcript text, without touching disk.
 * Transcripts whose path is not in the index are ignored.
 */
export function createFileIndex(
  paths: readonly string[],
  transcriptText: Record<string, string> = {},
  options: Pick<FileIndexOptions, 'audioExtensions' | 'transcriptExtensions'> = DEFAULT_MATCHER_CONFIG.files
): FileIndex {
  const { groups, warnings } = indexFiles(paths, options)
  const transcripts = new Map<string, string>()
  for (const group of groups.values()) {
    for (const bucket of group.buckets) {
      const path = bucket.transcript?.path
      if (path !== undefined && transcriptText[path] !== undefined) {
        transcripts.set(path, transcriptText[path])
      }
    }
  }
  return { groups, transcripts, warnings }
}

