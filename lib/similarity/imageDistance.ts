import sharp from 'sharp'
import { CONSTANTS } from '../constants/enums'
import { describeError } from '../errors'
import type { FailedItem, PhotoRef } from '../types'
import { mapWithConcurrency } from '../utils/concurrency'

export interface PixelGrid {
  width: number
  height: number
  channels: number
  data: Uint8Array
}

export type ImageDecoder = (path: string) => Promise<PixelGrid>

export interface DistanceOptions {
  decoder: ImageDecoder
  defaultDistance?: number
  concurrency?: number
  phase?: string
}

export interface DistanceResult {
  scores: number[]
  failures: FailedItem[]
}

type DecodeOutcome =
  | { success: true; grid: PixelGrid }
  | { success: false; failure: FailedItem }

/**
 * Decode through sharp and resample to a fixed square so that two shots of
 * different resolution compare on content alone.
 */
export function createSharpDecoder(size: number = CONSTANTS.COMPARE_SIZE): ImageDecoder {
  return async (path: string) => {
    const { data, info } = await sharp(path)
      .rotate()
      .flatten({ background: '#000000' })
      .toColourspace('srgb')
      .resize(size, size, { fit: 'fill' })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true })

    return {
      width: info.width,
      height: info.height,
      channels: info.channels,
      data: new Uint8Array(data.buffer, data.byteOffset, data.length)
    }
  }
}

/**
 * Mean absolute channel difference scaled to [0, 1].
 * 0 means identical pixels, 1 means every channel flipped between 0 and 255.
 */
export function pixelDistance(a: PixelGrid, b: PixelGrid): number {
  if (a.width !== b.width || a.height !== b.height || a.channels !== b.channels) {
    throw new Error(
      `Cannot compare ${a.width}x${a.height}x${a.channels} with ${b.width}x${b.height}x${b.channels}`
    )
  }
  if (a.data.length === 0) return 0

  let total = 0
  for (let i = 0; i < a.data.length; i++) {
    total += Math.abs(a.data[i] - b.data[i])
  }
  return total / (a.data.length * 255)
}

/**
 * Score every consecutive pair of `photos`.
 *
 * Each photo is decoded once. A photo that cannot be decoded is reported
 * and both pairs that touch it score `defaultDistance`.
 */
export async function computeDistances(
  photos: readonly PhotoRef[],
  options: DistanceOptions
): Promise<DistanceResult> {
  const defaultDistance = options.defaultDistance ?? CONSTANTS.DEFAULT_DISTANCE
  if (photos.length < 2) {
    return { scores: [], failures: [] }
  }

  const limit = Math.min(options.concurrency ?? CONSTANTS.DECODE_CONCURRENCY, photos.length)

  const decoded = await mapWithConcurrency(photos, limit, async (photo): Promise<DecodeOutcome> => {
    try {
      return { success: true, grid: await options.decoder(photo.path) }
    } catch (error) {
      console.warn(`⚠️ Could not decode ${photo.fileName}, using default distance ${defaultDistance}`)
      return {
        success: false,
        failure: {
          fileName: photo.fileName,
          reason: `Failed to decode image: ${describeError(error)}`,
          step: 'decode',
          phase: options.phase
        }
      }
    }
  })

  const scores: number[] = []
  for (let i = 0; i < decoded.length - 1; i++) {
    const left = decoded[i]
    const right = decoded[i + 1]
    if (left.success && right.success && sameShape(left.grid, right.grid)) {
      scores.push(pixelDistance(left.grid, right.grid))
    } else {
      scores.push(defaultDistance)
    }
  }

  const failures: FailedItem[] = []
  for (const outcome of decoded) {
    if (!outcome.success) failures.push(outcome.failure)
  }

  return { scores, failures }
}

function sameShape(a: PixelGrid, b: PixelGrid): boolean {
  return a.width === b.width && a.height === b.height && a.channels === b.channels
}
