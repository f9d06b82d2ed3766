import path from 'path'
import { CSV_HEADERS, type CSVHeader } from '../constants/headers'
import { formatIsoDate } from '../date/calendar'
import { stampedOutputPath } from '../files/rename'
import { formatClockTime } from '../stamp/formatTimestamp'
import type { StampRecord } from '../types'

export function stampRow(record: StampRecord): Record<CSVHeader, string> {
  return {
    'Phase': record.phase,
    'Group': record.groupKey,
    'Original File': record.photo.fileName,
    'Stamped File': path.basename(stampedOutputPath(record.photo.path)),
    'Date': formatIsoDate(record.clock.date),
    'Time': formatClockTime(record.clock),
    'Stamp Text': record.formatted,
    'Location': record.location
  }
}

export function buildStampCsv(records: readonly StampRecord[]): string {
  // Start with UTF-8 BOM so spreadsheet apps pick up Cyrillic text
  let csv = '\uFEFF'

  csv += CSV_HEADERS.map(header => escapeCSVField(header)).join(',') + '\r\n'

  for (const record of records) {
    const row = stampRow(record)
    csv += CSV_HEADERS.map(header => escapeCSVField(row[header])).join(',') + '\r\n'
  }

  return csv
}

export function escapeCSVField(field: string): string {
  // If field contains comma, double quote, or newline, wrap in quotes
  if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`
  }
  return field
}
