import { CONSTANTS, type DateFormatRule, type StampLocale } from '../constants/enums'
import { describeError } from '../errors'
import type { FailedItem, PhotoRef, RandomSource, StampRecord, TimedPhoto } from '../types'
import { mapWithConcurrency } from '../utils/concurrency'
import { randomChoice } from '../utils/random'
import { formatTimestamp } from './formatTimestamp'

/**
 * Draws the stamp onto a photo. Resolves once the output is written and
 * rejects when the photo could not be stamped.
 */
export interface StampRenderer {
  render(photo: PhotoRef, formattedTimestamp: string, location: string): Promise<void>
}

export interface DispatchOptions {
  locations: readonly string[]
  random: RandomSource
  renderer: StampRenderer
  locale?: StampLocale | DateFormatRule
  concurrency?: number
}

export interface DispatchResult {
  records: StampRecord[]
  stamped: StampRecord[]
  failed: FailedItem[]
}

/**
 * Pair each timed photo with a location, freeze the record, then render.
 * Locations are all drawn before rendering starts so the draw sequence
 * depends only on record order.
 */
export function createStampRecords(
  timed: readonly TimedPhoto[],
  locations: readonly string[],
  random: RandomSource,
  locale: StampLocale | DateFormatRule = 'ru'
): StampRecord[] {
  if (locations.length === 0) {
    throw new Error('At least one location is required to stamp photos')
  }

  return timed.map(item =>
    Object.freeze({
      photo: item.photo,
      phase: item.phase,
      groupKey: item.groupKey,
      clock: item.clock,
      formatted: formatTimestamp(item.clock, locale),
      location: randomChoice(locations, random)
    })
  )
}

export async function dispatchStamps(
  timed: readonly TimedPhoto[],
  options: DispatchOptions
): Promise<DispatchResult> {
  const records = createStampRecords(timed, options.locations, options.random, options.locale)
  if (records.length === 0) {
    return { records, stamped: [], failed: [] }
  }

  const limit = Math.min(options.concurrency ?? CONSTANTS.RENDER_CONCURRENCY, records.length)

  const outcomes = await mapWithConcurrency(records, limit, async (record): Promise<FailedItem | null> => {
    try {
      await options.renderer.render(record.photo, record.formatted, record.location)
      return null
    } catch (error) {
      console.error(`❌ Failed to stamp ${record.photo.fileName}:`, describeError(error))
      return {
        fileName: record.photo.fileName,
        reason: `Failed to render stamp: ${describeError(error)}`,
        step: 'render',
        phase: record.phase
      }
    }
  })

  const stamped: StampRecord[] = []
  const failed: FailedItem[] = []
  outcomes.forEach((outcome, index) => {
    if (outcome) {
      failed.push(outcome)
    } else {
      stamped.push(records[index])
    }
  })

  return { records, stamped, failed }
}
