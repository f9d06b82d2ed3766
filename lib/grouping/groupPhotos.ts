import type { PhotoGroup, PhotoRef } from '../types'

export interface GroupKey {
  key: string // '' when the filename carries no prefix
  residual: string
}

const PREFIX_PATTERN = /^[\d_]+/

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'variant' })

/**
 * Split a filename into its sub-session prefix and the rest.
 *
 * The prefix is the leading run of digits and underscores with trailing
 * underscores dropped: "2_14_IMG_0042.jpg" -> "2_14", "003.jpg" -> "003".
 */
export function extractGroupKey(fileName: string): GroupKey {
  const match = PREFIX_PATTERN.exec(fileName)
  if (!match) {
    return { key: '', residual: fileName }
  }

  const key = match[0].replace(/_+$/, '')
  if (!key) {
    return { key: '', residual: fileName }
  }
  return { key, residual: fileName.slice(match[0].length) }
}

/**
 * Natural filename order ("2_a" before "10_a"), falling back to code points
 * so that two distinct names never compare equal.
 */
export function compareFileNames(a: string, b: string): number {
  const natural = collator.compare(a, b)
  if (natural !== 0) return natural
  return a < b ? -1 : a > b ? 1 : 0
}

export function sortByFileName(photos: readonly PhotoRef[]): PhotoRef[] {
  return [...photos].sort((a, b) => compareFileNames(a.fileName, b.fileName))
}

/**
 * Partition a phase listing into groups.
 * Groups come out in order of their key's first appearance in the sorted
 * listing and members keep sorted order.
 */
export function groupPhotos(phase: string, photos: readonly PhotoRef[]): PhotoGroup[] {
  const groups = new Map<string, PhotoGroup>()

  for (const photo of sortByFileName(photos)) {
    const { key } = extractGroupKey(photo.fileName)
    const existing = groups.get(key)
    if (existing) {
      existing.photos.push(photo)
    } else {
      groups.set(key, { phase, key, photos: [photo] })
    }
  }

  return Array.from(groups.values())
}

/**
 * Keep one photo per group: the one with the longest filename, which is the
 * most processed variant when several copies of a shot sit side by side
 * (e.g. "3_IMG_01.jpg" and "3_IMG_01_filtered.jpg").
 *
 * A file without a prefix is a shot of its own, so the implicit group
 * keeps every member.
 */
export function pickRepresentatives(groups: readonly PhotoGroup[]): PhotoGroup[] {
  return groups.map(group => {
    if (group.key === '') return { ...group, photos: [...group.photos] }
    const chosen = group.photos.reduce((best, photo) =>
      photo.fileName.length > best.fileName.length ? photo : best
    )
    return { ...group, photos: [chosen] }
  })
}

export function flattenGroups(groups: readonly PhotoGroup[]): PhotoRef[] {
  return groups.flatMap(group => group.photos)
}
