// Column order of stamps.csv
export const CSV_HEADERS = [
  'Phase',
  'Group',
  'Original File',
  'Stamped File',
  'Date',
  'Time',
  'Stamp Text',
  'Location'
] as const

export type CSVHeader = typeof CSV_HEADERS[number]
