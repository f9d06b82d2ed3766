import { DATE_FORMAT_RULES, type DateFormatRule, type StampLocale } from '../constants/enums'
import { clockParts, type Clock } from '../time/clock'

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * "14 мар. 2025 г. 08:05:09" for ru, "14 Mar. 2025 08:05:09" for en.
 * Fractional seconds are dropped, never rounded up.
 */
export function formatTimestamp(clock: Clock, rule: DateFormatRule | StampLocale = 'ru'): string {
  const { months, yearSuffix } = typeof rule === 'string' ? DATE_FORMAT_RULES[rule] : rule
  const { hours, minutes, seconds } = clockParts(clock)
  const month = months[clock.date.month - 1]

  return `${pad(clock.date.day)} ${month}. ${clock.date.year}${yearSuffix} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

export function formatClockTime(clock: Clock): string {
  const { hours, minutes, seconds } = clockParts(clock)
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}
