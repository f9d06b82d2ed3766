import { randomUUID } from 'crypto'
import { allocateIntervals } from '../allocation/allocateIntervals'
import type { RunConfig } from '../config/loadConfig'
import { ConfigError } from '../errors'
import { createFolderLister, type PhotoLister } from '../files/listing'
import { flattenGroups, groupPhotos, pickRepresentatives } from '../grouping/groupPhotos'
import { createProgressReporter, type ProgressListener } from '../progress/manager'
import { createSharpRenderer } from '../render/sharpRenderer'
import { computeDistances, createSharpDecoder, type ImageDecoder } from '../similarity/imageDistance'
import { dispatchStamps, type StampRenderer } from '../stamp/dispatchStamps'
import { formatTimestamp } from '../stamp/formatTimestamp'
import { createClock, type Clock } from '../time/clock'
import { assertPhaseBudget, sequencePhases, sequenceSpan } from '../time/sequencer'
import type { FailedItem, PhasePlan, RandomSource, RunReport, StampRecord } from '../types'
import { createSeededRandom, randomSymmetric } from '../utils/random'

export interface RunCollaborators {
  lister?: PhotoLister
  decoder?: ImageDecoder
  renderer?: StampRenderer
  random?: RandomSource
  onProgress?: ProgressListener
  runId?: string
}

/**
 * One stamping run: list, group, compare, allocate, sequence, stamp.
 *
 * Configuration problems surface as ConfigError before any timestamp exists.
 * Decode and render failures are collected on the report instead.
 */
export async function runStamping(config: RunConfig, collaborators: RunCollaborators = {}): Promise<RunReport> {
  const runId = collaborators.runId ?? randomUUID()
  const lister = collaborators.lister ?? createFolderLister(config.folderPath)
  const decoder = collaborators.decoder ?? createSharpDecoder()
  const renderer = collaborators.renderer ?? createSharpRenderer({ rotateLandscape: config.rotateLandscape })
  const random = collaborators.random ?? (config.seed !== undefined ? createSeededRandom(config.seed) : Math.random)
  const report = createProgressReporter(runId, collaborators.onProgress)

  console.log(`=== Stamping run ${runId} started ===`)
  report(0, 'Starting run...', 'starting', { total: config.phases.length })

  assertBudgets(config)
  if (config.locations.length === 0) {
    throw new ConfigError('At least one location is required', { key: 'locations' })
  }

  const failed: FailedItem[] = []
  const plans: PhasePlan[] = []
  const phaseShare = 50 / Math.max(config.phases.length, 1)

  for (const [index, budget] of config.phases.entries()) {
    const base = 5 + index * phaseShare
    report(base, `Listing photos for phase "${budget.name}"...`, 'listing', { phase: budget.name })

    const photos = await lister(budget.name)
    let groups = groupPhotos(budget.name, photos)
    if (config.representativesOnly) {
      groups = pickRepresentatives(groups)
    }
    const sequence = flattenGroups(groups)
    console.log(`Phase "${budget.name}": ${sequence.length} photos in ${groups.length} groups`)

    report(base + phaseShare / 2, `Comparing photos in phase "${budget.name}"...`, 'comparing', {
      phase: budget.name,
      total: sequence.length
    })
    const { scores, failures } = await computeDistances(sequence, {
      decoder,
      defaultDistance: config.defaultDistance,
      phase: budget.name
    })
    failed.push(...failures)

    const deltas = allocateIntervals(scores, budget.durationSeconds, { minDelta: config.minDelta })
    plans.push({ budget, groups, deltas })
  }

  report(60, 'Sequencing timestamps...', 'sequencing')
  const start = startClock(config, random)
  const { timed } = sequencePhases(plans, {
    start,
    random,
    jitter: config.jitter,
    offsetJitterSeconds: config.offsetJitterSeconds
  })

  report(70, `Stamping ${timed.length} photos...`, 'stamping', { total: timed.length })
  const dispatched = await dispatchStamps(timed, {
    locations: config.locations,
    random,
    renderer,
    locale: config.locale
  })
  failed.push(...dispatched.failed)

  const groupCount = plans.reduce((acc, plan) => acc + plan.groups.length, 0)
  report(100, 'Run complete', 'complete', { processed: dispatched.stamped.length, total: timed.length })
  console.log(`=== Stamping run ${runId} finished: ${dispatched.stamped.length}/${timed.length} stamped ===`)

  return {
    runId,
    records: dispatched.records,
    stamped: dispatched.stamped,
    failed,
    summary: {
      phases: plans.length,
      groups: groupCount,
      photos: timed.length,
      stamped: dispatched.stamped.length,
      decodeFailures: countStep(failed, 'decode'),
      renderFailures: countStep(failed, 'render'),
      exportFailures: 0,
      spanSeconds: sequenceSpan(timed),
      firstStamp: stampText(dispatched.records[0]),
      lastStamp: stampText(dispatched.records[dispatched.records.length - 1])
    }
  }
}

function assertBudgets(config: RunConfig): void {
  if (config.phases.length === 0) {
    throw new ConfigError('At least one phase is required', { key: 'phases' })
  }
  config.phases.forEach(assertPhaseBudget)
}

function startClock(config: RunConfig, random: RandomSource): Clock {
  const jitter = config.startJitterSeconds > 0 ? randomSymmetric(config.startJitterSeconds, random) : 0
  return createClock(config.date, Math.max(0, config.startSeconds + jitter))
}

function countStep(failed: readonly FailedItem[], step: FailedItem['step']): number {
  return failed.filter(item => item.step === step).length
}

function stampText(record: StampRecord | undefined): string | undefined {
  return record ? formatTimestamp(record.clock, 'en') : undefined
}
