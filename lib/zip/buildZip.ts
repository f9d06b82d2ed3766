import archiver from 'archiver'
import { promises as fs } from 'fs'
import path from 'path'
import { buildStampCsv } from '../csv/buildCsv'
import { describeError } from '../errors'
import { generateSequentialName, stampedOutputPath } from '../files/rename'
import { clockToDate } from '../time/clock'
import type { FailedItem, StampRecord } from '../types'

export interface ManifestEntry {
  index: number
  phase: string
  group: string
  originalFilename: string
  exportedFilename: string
  timestamp: string
  location: string
}

export interface ZipContentInput {
  stamped: StampRecord[]
  failed: FailedItem[]
  /** Reads a stamped output; defaults to the file next to the original */
  readStamped?: (record: StampRecord) => Promise<Buffer>
}

export interface ZipContent {
  archive: archiver.Archiver
  manifest: ManifestEntry[]
  failed: FailedItem[]
}

const readFromDisk = (record: StampRecord) => fs.readFile(stampedOutputPath(record.photo.path))

/**
 * Bundle stamped photos in capture order with stamps.csv and manifest.json.
 * A stamped file that cannot be read is left out and listed in FAILED.json.
 */
export async function createZipStream(input: ZipContentInput): Promise<ZipContent> {
  const { stamped } = input
  const readStamped = input.readStamped ?? readFromDisk

  const archive = archiver('zip', {
    zlib: { level: 9 }
  })

  const manifest: ManifestEntry[] = []
  const exportFailures: FailedItem[] = []
  const included: StampRecord[] = []

  for (const record of stamped) {
    let buffer: Buffer
    try {
      buffer = await readStamped(record)
    } catch (error) {
      exportFailures.push({
        fileName: record.photo.fileName,
        reason: `Failed to read stamped output: ${describeError(error)}`,
        step: 'export',
        phase: record.phase
      })
      continue
    }

    included.push(record)
    const exportedFilename = generateSequentialName(record.clock, included.length)
    archive.append(buffer, { name: `photos/${exportedFilename}`, date: clockToDate(record.clock) })

    manifest.push({
      index: included.length,
      phase: record.phase,
      group: record.groupKey,
      originalFilename: record.photo.fileName,
      exportedFilename,
      timestamp: record.formatted,
      location: record.location
    })
  }

  archive.append(Buffer.from(buildStampCsv(included), 'utf8'), { name: 'stamps.csv' })
  archive.append(Buffer.from(JSON.stringify(manifest, null, 2), 'utf8'), { name: 'manifest.json' })

  const failed = [...input.failed, ...exportFailures]
  if (failed.length > 0) {
    archive.append(Buffer.from(JSON.stringify(failed, null, 2), 'utf8'), { name: 'FAILED.json' })
  }

  return { archive, manifest, failed: exportFailures }
}

export async function streamZipToBuffer(archive: archiver.Archiver): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []

    archive.on('data', (chunk: Buffer) => {
      chunks.push(chunk)
    })

    archive.on('end', () => {
      resolve(Buffer.concat(chunks))
    })

    archive.on('error', (err) => {
      reject(err)
    })

    // Finalize the archive (this triggers the streaming)
    archive.finalize().catch(reject)
  })
}

export async function writeZip(archive: archiver.Archiver, target: string): Promise<void> {
  const buffer = await streamZipToBuffer(archive)
  await fs.mkdir(path.dirname(target), { recursive: true })
  await fs.writeFile(target, buffer)
}
