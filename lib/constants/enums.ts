// Stamp locales
export const LOCALES = ['ru', 'en'] as const
export type StampLocale = typeof LOCALES[number]

export interface DateFormatRule {
  months: readonly string[]
  yearSuffix: string
}

export const DATE_FORMAT_RULES: Record<StampLocale, DateFormatRule> = {
  ru: {
    months: ['янв', 'фев', 'мар', 'апр', 'мая', 'июн', 'июл', 'авг', 'сен', 'окт', 'ноя', 'дек'],
    yearSuffix: ' г.'
  },
  en: {
    months: ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'],
    yearSuffix: ''
  }
}

// Files
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const
export const STAMPED_MARKER = '_stamped'

// Constants
export const CONSTANTS = {
  SECONDS_PER_DAY: 24 * 60 * 60,
  DEFAULT_DISTANCE: 0.1, // treated as a moderate change between two frames
  COMPARE_SIZE: 32, // both images are resampled to COMPARE_SIZE x COMPARE_SIZE before diffing
  DECODE_CONCURRENCY: 4,
  RENDER_CONCURRENCY: 2,
  DEFAULT_JITTER: 0.15,
  // Stamp layout, relative to the rendered image
  STAMP_MAX_DIMENSION: 2000,
  STAMP_FONT_RATIO: 0.031,
  STAMP_PADDING_RATIO: 0.004,
  STAMP_LINE_GAP_RATIO: 0.28,
  STAMP_FONT_FAMILY: 'Noto Sans, DejaVu Sans, Arial, sans-serif',
  TIMEZONE: 'Europe/Moscow'
} as const
