export interface CalendarDate {
  year: number
  month: number // 1-12
  day: number
}

const DOTTED_DATE = /(\d{2})\.(\d{2})\.(\d{4})/
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Today's date in the given IANA time zone
 */
export function getZonedDate(timeZone: string, now: Date = new Date()): CalendarDate {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  })

  const parts = formatter.formatToParts(now)
  const year = parts.find(part => part.type === 'year')?.value
  const month = parts.find(part => part.type === 'month')?.value
  const day = parts.find(part => part.type === 'day')?.value

  if (!year || !month || !day) {
    throw new Error(`Could not resolve the current date in time zone ${timeZone}`)
  }

  return { year: Number(year), month: Number(month), day: Number(day) }
}

/**
 * Accepts DD.MM.YYYY (as used in folder names) or YYYY-MM-DD
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const trimmed = value.trim()

  const iso = ISO_DATE.exec(trimmed)
  if (iso) {
    return validDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))
  }

  const dotted = DOTTED_DATE.exec(trimmed)
  if (dotted && dotted[0] === trimmed) {
    return validDate(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]))
  }

  return null
}

/**
 * Find a DD.MM.YYYY date anywhere in a folder name, e.g. "14.03.2025 Substation 4"
 */
export function extractFolderDate(folderName: string): CalendarDate | null {
  const match = DOTTED_DATE.exec(folderName)
  if (!match) return null
  return validDate(Number(match[3]), Number(match[2]), Number(match[1]))
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days))
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  }
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day
}

export function formatIsoDate(date: CalendarDate): string {
  const month = String(date.month).padStart(2, '0')
  const day = String(date.day).padStart(2, '0')
  return `${date.year}-${month}-${day}`
}

function validDate(year: number, month: number, day: number): CalendarDate | null {
  const probe = new Date(Date.UTC(year, month - 1, day))
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null
  }
  return { year, month, day }
}
