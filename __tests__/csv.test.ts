import { buildStampCsv, escapeCSVField } from '@/lib/csv/buildCsv'
import { CSV_HEADERS } from '@/lib/constants/headers'
import { createClock } from '@/lib/time/clock'
import type { StampRecord } from '@/lib/types'

const createRecord = (overrides: Partial<StampRecord> = {}): StampRecord => ({
  photo: { path: '/photos/works/2_a.jpg', fileName: '2_a.jpg' },
  phase: 'works',
  groupKey: '2',
  clock: createClock({ year: 2025, month: 3, day: 14 }, 8 * 3600 + 5 * 60 + 9),
  formatted: '14 мар. 2025 г. 08:05:09',
  location: 'Substation 4',
  ...overrides
})

describe('Stamp CSV', () => {
  test('CSV headers are in the expected order', () => {
    expect(CSV_HEADERS).toEqual([
      'Phase',
      'Group',
      'Original File',
      'Stamped File',
      'Date',
      'Time',
      'Stamp Text',
      'Location'
    ])
  })

  test('starts with a BOM and uses CRLF line endings', () => {
    const csv = buildStampCsv([createRecord()])

    expect(csv.charCodeAt(0)).toBe(0xFEFF)
    expect(csv.slice(1).split('\r\n')).toEqual([
      'Phase,Group,Original File,Stamped File,Date,Time,Stamp Text,Location',
      'works,2,2_a.jpg,2_a_stamped.png,2025-03-14,08:05:09,14 мар. 2025 г. 08:05:09,Substation 4',
      ''
    ])
  })

  test('quotes locations with commas, quotes and line breaks', () => {
    const csv = buildStampCsv([createRecord({ location: 'Block "B", bay 4\nEast yard' })])

    expect(csv).toContain(',"Block ""B"", bay 4\nEast yard"\r\n')
  })

  test('leaves plain fields untouched', () => {
    expect(escapeCSVField('Substation 4')).toBe('Substation 4')
  })
})
