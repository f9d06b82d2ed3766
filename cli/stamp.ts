#!/usr/bin/env node
import { loadConfig } from '../lib/config/loadConfig'
import { ConfigError, describeError } from '../lib/errors'
import { removeStampedOutputs } from '../lib/files/listing'
import { runBatch } from '../lib/pipeline/runBatch'
import { runStamping } from '../lib/pipeline/runStamping'
import { logProgressEvent } from '../lib/progress/manager'
import type { RunReport } from '../lib/types'
import { createZipStream, writeZip } from '../lib/zip/buildZip'

export interface CliOptions {
  configPath: string
  seed?: number
  zipPath?: string
  keepStamped: boolean
  help: boolean
}

export const USAGE = `
Usage: photo-stamp --config <config.json> [options]

Options:
  --config <path>    Run configuration (required)
  --seed <n>         Seed the random source for a reproducible run
  --zip <path>       Also write stamped photos, stamps.csv and manifest.json to a ZIP
  --keep-stamped     Do not delete *_stamped files from earlier runs
  --help             Show this message
`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { configPath: '', keepStamped: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    switch (arg) {
      case '--config':
        options.configPath = requireValue(args, ++i, arg)
        break
      case '--seed': {
        const raw = requireValue(args, ++i, arg)
        const seed = Number(raw)
        if (!Number.isInteger(seed)) {
          throw new UsageError(`--seed expects an integer, got "${raw}"`)
        }
        options.seed = seed
        break
      }
      case '--zip':
        options.zipPath = requireValue(args, ++i, arg)
        break
      case '--keep-stamped':
        options.keepStamped = true
        break
      case '--help':
      case '-h':
        options.help = true
        break
      default:
        throw new UsageError(`Unknown option: ${arg}`)
    }
  }

  if (!options.help && !options.configPath) {
    throw new UsageError('--config is required')
  }
  return options
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index]
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} expects a value`)
  }
  return value
}

export function formatReport(report: RunReport): string[] {
  const { summary, failed } = report
  const lines = [
    ...(summary.folders !== undefined ? [`Folders: ${summary.folders}`] : []),
    `Phases: ${summary.phases}, groups: ${summary.groups}, photos: ${summary.photos}`,
    `Stamped: ${summary.stamped}/${summary.photos}`,
    `Span: ${summary.firstStamp ?? '-'} → ${summary.lastStamp ?? '-'} (${Math.round(summary.spanSeconds)}s)`
  ]

  if (failed.length > 0) {
    lines.push(
      `⚠️ ${failed.length} problem(s): ${summary.decodeFailures} decode, ${summary.renderFailures} render, ${summary.exportFailures} export`
    )
    for (const item of failed) {
      const where = [item.folder, item.phase, item.fileName].filter(Boolean).join('/')
      lines.push(`   - [${item.step}] ${where}: ${item.reason}`)
    }
  }
  return lines
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions
  try {
    options = parseArgs(argv)
  } catch (error) {
    console.error(`❌ ${describeError(error)}`)
    console.log(USAGE)
    return 2
  }

  if (options.help) {
    console.log(USAGE)
    return 0
  }

  try {
    const config = await loadConfig(options.configPath)
    if (options.seed !== undefined) {
      config.seed = options.seed
    }

    if (!options.keepStamped) {
      const removed = await removeStampedOutputs(config.folderPath)
      console.log(`Removed ${removed.length} stamped file(s) from earlier runs`)
    }

    let report: RunReport
    if (config.batch) {
      const batch = await runBatch(config, { onProgress: logProgressEvent })
      for (const run of batch.runs) {
        console.log(`📁 ${run.folder.name}: ${run.report.summary.stamped}/${run.report.summary.photos} stamped`)
      }
      report = batch.report
    } else {
      report = await runStamping(config, { onProgress: logProgressEvent })
    }

    if (options.zipPath) {
      const { archive, manifest, failed } = await createZipStream({ stamped: report.stamped, failed: report.failed })
      report.failed.push(...failed)
      report.summary.exportFailures = failed.length
      await writeZip(archive, options.zipPath)
      console.log(`📦 Wrote ${manifest.length} photo(s) to ${options.zipPath}`)
    }

    formatReport(report).forEach(line => console.log(line))
    return 0
  } catch (error) {
    if (error instanceof ConfigError) {
      const where = error.phase ? ` (phase "${error.phase}")` : ''
      console.error(`❌ Configuration error${where}: ${error.message}`)
      return 1
    }
    throw error
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error('❌ Run failed:', error)
      process.exitCode = 1
    })
}
