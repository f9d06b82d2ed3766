import type { PhaseBudget, PhasePlan, RandomSource, TimedPhoto } from '../types'
import { ConfigError } from '../errors'
import { randomSymmetric } from '../utils/random'
import { advanceClock, clockDifference, compareClocks, type Clock } from './clock'

export interface SequenceOptions {
  start: Clock
  random: RandomSource
  /** Jitter bound as a fraction of the phase's average delta (0 disables) */
  jitter?: number
  /** Random +/- seconds applied to each pre-phase offset, clamped at zero */
  offsetJitterSeconds?: number
}

export interface SequenceResult {
  timed: TimedPhoto[]
  /** Clock after the last phase, before any jitter */
  clock: Clock
}

/**
 * Walk phases in order and turn each phase's deltas into absolute times.
 *
 * Within a phase the groups are laid end to end and deltas[i] separates the
 * i-th and (i+1)-th photo of that sequence, so a group's first photo gets the
 * clock as it stands when the group is reached and a single-photo group
 * advances nothing. Jitter only moves emitted stamps; the carried clock
 * follows the nominal deltas so every phase spends exactly its budget.
 */
export function sequencePhases(plans: readonly PhasePlan[], options: SequenceOptions): SequenceResult {
  const { random } = options
  const jitter = options.jitter ?? 0
  const offsetJitter = options.offsetJitterSeconds ?? 0

  if (!Number.isFinite(jitter) || jitter < 0) {
    throw new ConfigError(`Jitter must be a non-negative fraction, got ${jitter}`, { key: 'jitter' })
  }

  const timed: TimedPhoto[] = []
  let clock = options.start
  let lastEmitted: Clock | null = null

  for (const plan of plans) {
    const { budget, groups, deltas } = plan
    assertPhaseBudget(budget)

    const offset = offsetJitter > 0
      ? Math.max(0, budget.offsetSeconds + randomSymmetric(offsetJitter, random))
      : budget.offsetSeconds
    clock = advanceClock(clock, offset)

    const photoCount = groups.reduce((acc, group) => acc + group.photos.length, 0)
    if (deltas.length !== Math.max(0, photoCount - 1)) {
      throw new Error(
        `Phase "${budget.name}" has ${photoCount} photos but ${deltas.length} deltas`
      )
    }

    const averageDelta = deltas.length > 0 ? budget.durationSeconds / deltas.length : 0
    const jitterBound = jitter * averageDelta
    let position = 0

    for (const group of groups) {
      for (const photo of group.photos) {
        if (position > 0) {
          clock = advanceClock(clock, deltas[position - 1])
        }
        position += 1

        let stamp = jitterBound > 0 ? shift(clock, randomSymmetric(jitterBound, random)) : clock
        if (lastEmitted && compareClocks(stamp, lastEmitted) < 0) {
          stamp = lastEmitted
        }

        timed.push({ photo, phase: budget.name, groupKey: group.key, clock: stamp })
        lastEmitted = stamp
      }
    }
  }

  return { timed, clock }
}

// Negative shifts stop at midnight instead of reaching into the previous day
function shift(clock: Clock, seconds: number): Clock {
  if (seconds >= 0) return advanceClock(clock, seconds)
  if (clock.seconds + seconds >= 0) {
    return { date: clock.date, seconds: clock.seconds + seconds }
  }
  return { date: clock.date, seconds: 0 }
}

/**
 * A phase cannot be sequenced without a usable budget
 */
export function assertPhaseBudget({ name, durationSeconds, offsetSeconds }: PhaseBudget): void {
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new ConfigError(`Phase "${name}" has no valid duration budget`, { phase: name, key: 'budgets' })
  }
  if (!Number.isFinite(offsetSeconds) || offsetSeconds < 0) {
    throw new ConfigError(`Phase "${name}" has an invalid start offset`, { phase: name, key: 'offsets' })
  }
}

/**
 * Seconds between the first and last emitted stamp
 */
export function sequenceSpan(timed: readonly TimedPhoto[]): number {
  if (timed.length < 2) return 0
  return clockDifference(timed[0].clock, timed[timed.length - 1].clock)
}
