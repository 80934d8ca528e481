#!/usr/bin/env npx tsx
/**
 * Match Recordings Script
 *
 * Pairs a scraped meeting list with the audio/transcript files of an export
 * directory and writes the dataset, the audit CSV and the ambiguity log.
 *
 * Usage:
 *   npx tsx scripts/match-recordings.ts --records=meetings.json --dir=./export
 *
 * Options:
 *   --records=<file>    Scraped meeting list (JSON array), required
 *   --dir=<directory>   Export directory holding audio and transcripts, required
 *   --out=<file>        Dataset output (default: meetings_data.json)
 *   --audit=<file>      Audit CSV output (default: match_audit.csv)
 *   --ambiguity=<file>  Ambiguity log output (default: ambiguity_log.json)
 *   --policy=<policy>   'audio' or 'complete' (default: audio)
 *   --recursive         Also scan subdirectories of the export directory
 *   --debug             Log every decision
 */

import { readFile, writeFile } from 'fs/promises'
import {
  AuditReporter,
  MeetingMatcher,
  buildAssignmentDataset,
  buildFileIndex,
  createConsoleLogger,
  createPrefixedLogger,
  isMeetingMatcherError,
  parseMetadataRecords,
} from '../src'
import type { RecordingPolicy } from '../src'

interface CliOptions {
  records?: string
  dir?: string
  out: string
  audit: string
  ambiguity: string
  policy: RecordingPolicy
  recursive: boolean
  debug: boolean
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    out: 'meetings_data.json',
    audit: 'match_audit.csv',
    ambiguity: 'ambiguity_log.json',
    policy: 'audio',
    recursive: false,
    debug: false,
  }

  for (const arg of args) {
    const value = arg.slice(arg.indexOf('=') + 1)
    if (arg.startsWith('--records=')) options.records = value
    if (arg.startsWith('--dir=')) options.dir = value
    if (arg.startsWith('--out=')) options.out = value
    if (arg.startsWith('--audit=')) options.audit = value
    if (arg.startsWith('--ambiguity=')) options.ambiguity = value
    if (arg.startsWith('--policy=')) {
      if (value !== 'audio' && value !== 'complete') {
        throw new Error(`Unknown policy '${value}'; expected 'audio' or 'complete'`)
      }
      options.policy = value
    }
    if (arg === '--recursive') options.recursive = true
    if (arg === '--debug') options.debug = true
  }

  return options
}

async function main() {
  const options = parseArgs(process.argv.slice(2))
  if (!options.records || !options.dir) {
    console.error('Usage: match-recordings --records=<file> --dir=<directory> [--out=<file>]')
    process.exitCode = 2
    return
  }

  const logger = createConsoleLogger({ debug: options.debug })

  const raw: unknown = JSON.parse(await readFile(options.records, 'utf8'))
  const { records, warnings } = parseMetadataRecords(raw)
  for (const warning of warnings) {
    logger.warn(warning.message, { index: warning.index, code: warning.code })
  }

  const matcher = MeetingMatcher.create()
    .recordingPolicy(options.policy)
    .files({ recursive: options.recursive })
    .logger(createPrefixedLogger('match', logger))
    .build()
  const config = matcher.getConfig()

  const index = await buildFileIndex(
    options.dir,
    config.files,
    createPrefixedLogger('index', logger)
  )
  const run = matcher.match(records, index)

  const dataset = buildAssignmentDataset(run, index, {
    excerptLength: config.excerptLength,
  })
  const reporter = new AuditReporter(run)

  await writeFile(options.out, JSON.stringify(dataset, null, 2), 'utf8')
  await writeFile(options.audit, reporter.exportToCsv(), 'utf8')
  await writeFile(options.ambiguity, reporter.exportAmbiguityLog(), 'utf8')

  const stats = reporter.summary()
  console.log('=== Recording Match Summary ===')
  console.log(`  Records:           ${stats.total}`)
  console.log(`  With recording:    ${stats.withRecording}`)
  console.log(`  Without recording: ${stats.withoutRecording}`)
  console.log(
    `  By method:         exact ${stats.byMethod.exact}, fuzzy ${stats.byMethod.fuzzy}, ` +
      `fallback ${stats.byMethod.fallback}, none ${stats.byMethod.none}`
  )
  console.log(`  Ambiguous:         ${stats.ambiguous}`)
  console.log('')
  console.log(`Dataset written to ${options.out}`)
  console.log(`Audit written to ${options.audit}`)
  console.log(`Ambiguity log written to ${options.ambiguity}`)
}

main().catch((error: unknown) => {
  if (isMeetingMatcherError(error)) {
    console.error(`[${error.code}] ${error.message}`, error.context ?? '')
  } else {
    console.error(error)
  }
  process.exitCode = 1
})
