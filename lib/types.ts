import type { Clock } from './time/clock'

export interface PhotoRef {
  path: string
  fileName: string
}

export interface PhotoGroup {
  phase: string
  key: string // '' for the implicit group
  photos: PhotoRef[]
}

export interface PhaseBudget {
  name: string
  durationSeconds: number
  offsetSeconds: number
}

export interface PhasePlan {
  budget: PhaseBudget
  groups: PhotoGroup[]
  deltas: number[] // one per consecutive pair across the whole phase sequence
}

export interface TimedPhoto {
  photo: PhotoRef
  phase: string
  groupKey: string
  clock: Clock
}

export interface StampRecord {
  readonly photo: PhotoRef
  readonly phase: string
  readonly groupKey: string
  readonly clock: Clock
  readonly formatted: string
  readonly location: string
}

export interface FailedItem {
  fileName: string
  reason: string
  step: 'decode' | 'render' | 'export'
  phase?: string
  folder?: string // dated folder of a batch run
}

export interface RunSummary {
  folders?: number // set on batch runs
  phases: number
  groups: number
  photos: number
  stamped: number
  decodeFailures: number
  renderFailures: number
  exportFailures: number
  spanSeconds: number
  firstStamp?: string
  lastStamp?: string
}

export interface RunReport {
  runId: string
  records: StampRecord[]
  stamped: StampRecord[]
  failed: FailedItem[]
  summary: RunSummary
}

// Uniform in [0, 1)
export type RandomSource = () => number
