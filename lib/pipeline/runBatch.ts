import { randomUUID } from 'crypto'
import type { RunConfig } from '../config/loadConfig'
import { ConfigError } from '../errors'
import { listDatedFolders, type DatedFolder, type PhotoLister } from '../files/listing'
import type { RunReport, RunSummary } from '../types'
import { createSeededRandom } from '../utils/random'
import { runStamping, type RunCollaborators } from './runStamping'

export interface BatchCollaborators extends Omit<RunCollaborators, 'lister'> {
  /** Phase lister for one dated folder; defaults to its phase subfolders */
  listerFor?: (folderPath: string) => PhotoLister
}

export interface BatchRun {
  folder: DatedFolder
  report: RunReport
}

export interface BatchReport {
  runs: BatchRun[]
  skipped: string[]
  report: RunReport
}

/**
 * Stamp every dated folder under `config.folderPath` in date order.
 * Each folder is its own working day: its date comes from the folder name
 * and its clock starts again at the configured start time.
 */
export async function runBatch(config: RunConfig, collaborators: BatchCollaborators = {}): Promise<BatchReport> {
  const runId = collaborators.runId ?? randomUUID()
  const { folders, skipped } = await listDatedFolders(config.folderPath)

  for (const name of skipped) {
    console.warn(`⚠️ Skipping folder "${name}": no DD.MM.YYYY date in its name`)
  }
  if (folders.length === 0) {
    throw new ConfigError(`No dated folders (DD.MM.YYYY) found in ${config.folderPath}`, { key: 'folderPath' })
  }

  // Shared by every folder: a seed reproduces the whole batch
  const random = collaborators.random ?? (config.seed !== undefined ? createSeededRandom(config.seed) : Math.random)
  const { listerFor, ...shared } = collaborators

  console.log(`=== Batch ${runId}: ${folders.length} dated folder(s) ===`)
  const runs: BatchRun[] = []

  for (const [index, folder] of folders.entries()) {
    console.log(`📁 [${index + 1}/${folders.length}] ${folder.name}`)
    const report = await runStamping(
      { ...config, folderPath: folder.path, date: folder.date },
      { ...shared, random, runId: `${runId}-${index + 1}`, lister: listerFor?.(folder.path) }
    )
    runs.push({
      folder,
      report: { ...report, failed: report.failed.map(item => ({ ...item, folder: folder.name })) }
    })
  }

  return { runs, skipped, report: mergeReports(runId, runs.map(run => run.report)) }
}

export function mergeReports(runId: string, reports: readonly RunReport[]): RunReport {
  const total = (pick: (summary: RunSummary) => number) =>
    reports.reduce((acc, report) => acc + pick(report.summary), 0)
  const stamps = reports.map(report => report.summary)

  return {
    runId,
    records: reports.flatMap(report => report.records),
    stamped: reports.flatMap(report => report.stamped),
    failed: reports.flatMap(report => report.failed),
    summary: {
      folders: reports.length,
      phases: reports[0]?.summary.phases ?? 0,
      groups: total(summary => summary.groups),
      photos: total(summary => summary.photos),
      stamped: total(summary => summary.stamped),
      decodeFailures: total(summary => summary.decodeFailures),
      renderFailures: total(summary => summary.renderFailures),
      exportFailures: total(summary => summary.exportFailures),
      spanSeconds: total(summary => summary.spanSeconds),
      firstStamp: stamps.find(summary => summary.firstStamp)?.firstStamp,
      lastStamp: [...stamps].reverse().find(summary => summary.lastStamp)?.lastStamp
    }
  }
}
