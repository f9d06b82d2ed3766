import { promises as fs, type Dirent } from 'fs'
import path from 'path'
import { IMAGE_EXTENSIONS, STAMPED_MARKER } from '../constants/enums'
import { compareDates, extractFolderDate, type CalendarDate } from '../date/calendar'
import { ConfigError } from '../errors'
import { compareFileNames } from '../grouping/groupPhotos'
import type { PhotoRef } from '../types'

/**
 * Supplies the photo listing for one phase
 */
export type PhotoLister = (phase: string) => Promise<PhotoRef[]>

export interface DatedFolder {
  name: string
  path: string
  date: CalendarDate
}

export function isCandidateImage(fileName: string): boolean {
  const lower = fileName.toLowerCase()
  if (lower.includes(STAMPED_MARKER)) return false
  return IMAGE_EXTENSIONS.some(extension => lower.endsWith(extension))
}

/**
 * Photos of a phase live directly in `<root>/<phase>/`
 */
export async function listPhasePhotos(root: string, phase: string): Promise<PhotoRef[]> {
  const folder = path.join(root, phase)
  const entries = await readEntries(
    folder,
    () => new ConfigError(`Phase folder not found: ${folder}`, { phase, key: 'folderPath' })
  )

  return entries
    .filter(entry => entry.isFile() && isCandidateImage(entry.name))
    .map(entry => ({ path: path.join(folder, entry.name), fileName: entry.name }))
}

export function createFolderLister(root: string): PhotoLister {
  return phase => listPhasePhotos(root, phase)
}

/**
 * Subfolders of `root` named with a DD.MM.YYYY date, e.g. "14.03.2025 Substation 4",
 * oldest first. Other subfolders are returned as `skipped`.
 */
export async function listDatedFolders(root: string): Promise<{ folders: DatedFolder[]; skipped: string[] }> {
  const entries = await readEntries(root, () => missingFolder(root))
  const folders: DatedFolder[] = []
  const skipped: string[] = []

  for (const entry of entries) {
    if (!entry.isDirectory()) continue
    const date = extractFolderDate(entry.name)
    if (date) {
      folders.push({ name: entry.name, path: path.join(root, entry.name), date })
    } else {
      skipped.push(entry.name)
    }
  }

  folders.sort((a, b) => compareDates(a.date, b.date) || compareFileNames(a.name, b.name))
  skipped.sort(compareFileNames)
  return { folders, skipped }
}

/**
 * Delete outputs of earlier runs anywhere below `root`
 * @returns the removed paths
 */
export async function removeStampedOutputs(root: string): Promise<string[]> {
  const removed: string[] = []
  const entries = await readEntries(root, () => missingFolder(root))

  for (const entry of entries) {
    const fullPath = path.join(root, entry.name)
    if (entry.isDirectory()) {
      removed.push(...(await removeStampedOutputs(fullPath)))
    } else if (entry.isFile() && entry.name.toLowerCase().includes(STAMPED_MARKER)) {
      await fs.unlink(fullPath)
      console.log(`🗑️ Removed stamped image: ${fullPath}`)
      removed.push(fullPath)
    }
  }

  return removed
}

async function readEntries(folder: string, notFound: () => ConfigError): Promise<Dirent[]> {
  try {
    return await fs.readdir(folder, { withFileTypes: true })
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw notFound()
    }
    throw error
  }
}

function missingFolder(folder: string): ConfigError {
  return new ConfigError(`Photo folder not found: ${folder}`, { key: 'folderPath' })
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
