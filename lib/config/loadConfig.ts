import { promises as fs } from 'fs'
import path from 'path'
import { CONSTANTS, LOCALES, type StampLocale } from '../constants/enums'
import { extractFolderDate, getZonedDate, parseCalendarDate, type CalendarDate } from '../date/calendar'
import { ConfigError, describeError } from '../errors'
import { parseClockTime, parseDuration } from '../time/clock'
import type { PhaseBudget } from '../types'

export interface RunConfig {
  folderPath: string
  date: CalendarDate
  startSeconds: number
  phases: PhaseBudget[]
  locations: string[]
  jitter: number
  minDelta: number
  defaultDistance: number
  startJitterSeconds: number
  offsetJitterSeconds: number
  locale: StampLocale
  timeZone: string
  representativesOnly: boolean
  rotateLandscape: boolean
  /** folderPath holds one dated folder per working day */
  batch: boolean
  seed?: number
}

export interface ParseOptions {
  /** Directory a relative folderPath is resolved against */
  baseDir?: string
  now?: Date
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read a JSON config file. Hand-edited files with trailing commas or
 * comments are repaired before giving up.
 */
export async function loadConfig(configPath: string, now?: Date): Promise<RunConfig> {
  let content: string
  try {
    content = await fs.readFile(configPath, 'utf8')
  } catch (error) {
    throw new ConfigError(`Failed to read config ${configPath}: ${describeError(error)}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (parseError) {
    try {
      const { jsonrepair } = await import('jsonrepair')
      raw = JSON.parse(jsonrepair(content))
      console.warn(`⚠️ Config ${configPath} was not strict JSON and has been repaired`)
    } catch (repairError) {
      throw new ConfigError(
        `Config ${configPath} is not valid JSON: ${describeError(parseError)} (repair failed: ${describeError(repairError)})`
      )
    }
  }

  return parseConfig(raw, { baseDir: path.dirname(path.resolve(configPath)), now })
}

export function parseConfig(raw: unknown, options: ParseOptions = {}): RunConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config must be a JSON object')
  }

  const folderPath = requireString(raw, 'folderPath')
  const resolvedFolder = path.resolve(options.baseDir ?? process.cwd(), folderPath)

  const startTime = requireString(raw, 'startTime')
  const startSeconds = parseClockTime(startTime)
  if (startSeconds === null) {
    throw new ConfigError(`startTime must be HH:MM:SS, got "${startTime}"`, { key: 'startTime' })
  }

  const timeZone = optionalString(raw, 'timeZone') ?? CONSTANTS.TIMEZONE
  const batch = optionalBoolean(raw, 'batch') ?? false
  if (batch && raw.date !== undefined) {
    throw new ConfigError('date cannot be set in batch mode, each folder is dated by its name', { key: 'date' })
  }
  const date = resolveDate(raw, resolvedFolder, timeZone, options.now)

  const budgets = raw.budgets
  if (!isRecord(budgets)) {
    throw new ConfigError('budgets must map each phase name to a duration', { key: 'budgets' })
  }
  const offsets = raw.offsets ?? {}
  if (!isRecord(offsets)) {
    throw new ConfigError('offsets must map phase names to durations', { key: 'offsets' })
  }

  const phaseNames = resolvePhaseNames(raw, budgets)
  const phases = phaseNames.map((name): PhaseBudget => {
    if (!(name in budgets)) {
      throw new ConfigError(`Phase "${name}" has no duration budget`, { phase: name, key: 'budgets' })
    }
    const durationSeconds = parseDuration(budgets[name])
    if (durationSeconds === null) {
      throw new ConfigError(
        `Phase "${name}" has an invalid duration budget: ${JSON.stringify(budgets[name])}`,
        { phase: name, key: 'budgets' }
      )
    }
    const offsetSeconds = name in offsets ? parseDuration(offsets[name]) : 0
    if (offsetSeconds === null) {
      throw new ConfigError(
        `Phase "${name}" has an invalid start offset: ${JSON.stringify(offsets[name])}`,
        { phase: name, key: 'offsets' }
      )
    }
    return { name, durationSeconds, offsetSeconds }
  })

  for (const name of Object.keys(offsets)) {
    if (!phaseNames.includes(name)) {
      throw new ConfigError(`Offset given for unknown phase "${name}"`, { phase: name, key: 'offsets' })
    }
  }

  const locations = raw.locations
  if (
    !Array.isArray(locations) ||
    locations.length === 0 ||
    !locations.every((location): location is string => typeof location === 'string' && location.trim().length > 0)
  ) {
    throw new ConfigError('locations must be a non-empty list of non-empty strings', { key: 'locations' })
  }

  const locale = optionalString(raw, 'locale') ?? 'ru'
  if (!isLocale(locale)) {
    throw new ConfigError(`locale must be one of ${LOCALES.join(', ')}, got "${locale}"`, { key: 'locale' })
  }

  const jitter = optionalNumber(raw, 'jitter') ?? CONSTANTS.DEFAULT_JITTER
  if (jitter > 1) {
    throw new ConfigError(`jitter is a fraction of the average delta and must be within 0..1, got ${jitter}`, { key: 'jitter' })
  }

  const seed = optionalNumber(raw, 'seed')
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new ConfigError(`seed must be an integer, got ${seed}`, { key: 'seed' })
  }

  return {
    folderPath: resolvedFolder,
    date,
    startSeconds,
    phases,
    locations,
    jitter,
    minDelta: optionalDuration(raw, 'minDelta') ?? 0,
    defaultDistance: optionalNumber(raw, 'defaultDistance') ?? CONSTANTS.DEFAULT_DISTANCE,
    startJitterSeconds: optionalDuration(raw, 'startJitterSeconds') ?? 0,
    offsetJitterSeconds: optionalDuration(raw, 'offsetJitterSeconds') ?? 0,
    locale,
    timeZone,
    representativesOnly: optionalBoolean(raw, 'representativesOnly') ?? false,
    rotateLandscape: optionalBoolean(raw, 'rotateLandscape') ?? true,
    batch,
    seed
  }
}

function resolvePhaseNames(raw: RawConfig, budgets: RawConfig): string[] {
  const phases = raw.phases
  if (phases === undefined) {
    const names = Object.keys(budgets)
    if (names.length === 0) {
      throw new ConfigError('At least one phase budget is required', { key: 'budgets' })
    }
    return names
  }

  if (
    !Array.isArray(phases) ||
    phases.length === 0 ||
    !phases.every((name): name is string => typeof name === 'string' && name.length > 0)
  ) {
    throw new ConfigError('phases must be a non-empty list of phase names', { key: 'phases' })
  }

  const seen = new Set<string>()
  for (const name of phases) {
    if (seen.has(name)) {
      throw new ConfigError(`Phase "${name}" is listed twice`, { phase: name, key: 'phases' })
    }
    seen.add(name)
  }
  return phases
}

function resolveDate(raw: RawConfig, folderPath: string, timeZone: string, now?: Date): CalendarDate {
  const explicit = optionalString(raw, 'date')
  if (explicit !== undefined) {
    const parsed = parseCalendarDate(explicit)
    if (!parsed) {
      throw new ConfigError(`date must be DD.MM.YYYY or YYYY-MM-DD, got "${explicit}"`, { key: 'date' })
    }
    return parsed
  }

  const fromFolder = extractFolderDate(path.basename(folderPath))
  if (fromFolder) return fromFolder

  try {
    return getZonedDate(timeZone, now)
  } catch (error) {
    throw new ConfigError(`Invalid timeZone "${timeZone}": ${describeError(error)}`, { key: 'timeZone' })
  }
}

function isLocale(value: string): value is StampLocale {
  return LOCALES.some(locale => locale === value)
}

function requireString(raw: RawConfig, key: string): string {
  const value = raw[key]
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`${key} is required`, { key })
  }
  return value
}

function optionalString(raw: RawConfig, key: string): string | undefined {
  const value = raw[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`, { key })
  }
  return value
}

function optionalNumber(raw: RawConfig, key: string): number | undefined {
  const value = raw[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number`, { key })
  }
  return value
}

function optionalDuration(raw: RawConfig, key: string): number | undefined {
  const value = raw[key]
  if (value === undefined) return undefined
  const seconds = parseDuration(value)
  if (seconds === null) {
    throw new ConfigError(`${key} must be seconds or HH:MM:SS`, { key })
  }
  return seconds
}

function optionalBoolean(raw: RawConfig, key: string): boolean | undefined {
  const value = raw[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be true or false`, { key })
  }
  return value
}
