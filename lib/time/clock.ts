import { CONSTANTS } from '../constants/enums'
import { addDays, compareDates, type CalendarDate } from '../date/calendar'

/**
 * Running capture clock for a single run.
 *
 * `seconds` is the time of day and always satisfies 0 <= seconds < 86400;
 * anything past midnight has already been folded into `date`.
 */
export interface Clock {
  readonly date: CalendarDate
  readonly seconds: number
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2}):(\d{2})$/
const DURATION_PATTERN = /^(\d+):(\d{2}):(\d{2})$/

/**
 * Parse a time of day in HH:MM:SS format to seconds since midnight
 * @returns null when the string is malformed or out of range
 */
export function parseClockTime(value: string): number | null {
  const match = TIME_PATTERN.exec(value.trim())
  if (!match) return null

  const [, hh, mm, ss] = match
  const hours = Number(hh)
  const minutes = Number(mm)
  const seconds = Number(ss)

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null
  }
  return hours * 3600 + minutes * 60 + seconds
}

/**
 * Durations are either plain seconds or an HH:MM:SS string.
 * Unlike a time of day, the hour field may exceed 23.
 */
export function parseDuration(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null
  }
  if (typeof value !== 'string') return null

  const match = DURATION_PATTERN.exec(value.trim())
  if (!match) return null

  const [, hh, mm, ss] = match
  const minutes = Number(mm)
  const seconds = Number(ss)
  if (minutes > 59 || seconds > 59) return null

  return Number(hh) * 3600 + minutes * 60 + seconds
}

export function createClock(date: CalendarDate, seconds: number): Clock {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Clock time must be a non-negative number of seconds, got ${seconds}`)
  }
  return normalize(date, seconds)
}

/**
 * Move the clock forward. Each wrap past 24:00:00 bumps the date by a day.
 */
export function advanceClock(clock: Clock, seconds: number): Clock {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Clock can only move forward, got an advance of ${seconds}s`)
  }
  if (seconds === 0) return clock
  return normalize(clock.date, clock.seconds + seconds)
}

function normalize(date: CalendarDate, seconds: number): Clock {
  const days = Math.floor(seconds / CONSTANTS.SECONDS_PER_DAY)
  const timeOfDay = seconds - days * CONSTANTS.SECONDS_PER_DAY
  return {
    date: days === 0 ? date : addDays(date, days),
    seconds: timeOfDay
  }
}

export function compareClocks(a: Clock, b: Clock): number {
  const byDate = compareDates(a.date, b.date)
  if (byDate !== 0) return byDate
  return a.seconds - b.seconds
}

/**
 * Seconds elapsed from `from` to `to` (negative when `to` is earlier)
 */
export function clockDifference(from: Clock, to: Clock): number {
  const fromMs = Date.UTC(from.date.year, from.date.month - 1, from.date.day)
  const toMs = Date.UTC(to.date.year, to.date.month - 1, to.date.day)
  const dayDiff = Math.round((toMs - fromMs) / 86_400_000)
  return dayDiff * CONSTANTS.SECONDS_PER_DAY + (to.seconds - from.seconds)
}

/**
 * Whole-second wall time parts, used for formatting and file naming
 */
export function clockParts(clock: Clock): { hours: number; minutes: number; seconds: number } {
  const whole = Math.floor(clock.seconds)
  return {
    hours: Math.floor(whole / 3600),
    minutes: Math.floor((whole % 3600) / 60),
    seconds: whole % 60
  }
}

/**
 * Local wall-clock Date for the clock (used only when writing file metadata)
 */
export function clockToDate(clock: Clock): Date {
  const { hours, minutes, seconds } = clockParts(clock)
  return new Date(clock.date.year, clock.date.month - 1, clock.date.day, hours, minutes, seconds)
}
