export { allocateIntervals } from './allocation/allocateIntervals'
export type { AllocationOptions } from './allocation/allocateIntervals'
export { loadConfig, parseConfig } from './config/loadConfig'
export type { RunConfig } from './config/loadConfig'
export { ConfigError } from './errors'
export { createFolderLister, listDatedFolders, listPhasePhotos, removeStampedOutputs } from './files/listing'
export type { DatedFolder, PhotoLister } from './files/listing'
export { extractGroupKey, groupPhotos, pickRepresentatives } from './grouping/groupPhotos'
export { mergeReports, runBatch } from './pipeline/runBatch'
export type { BatchCollaborators, BatchReport, BatchRun } from './pipeline/runBatch'
export { runStamping } from './pipeline/runStamping'
export type { RunCollaborators } from './pipeline/runStamping'
export { createSharpRenderer } from './render/sharpRenderer'
export { computeDistances, createSharpDecoder, pixelDistance } from './similarity/imageDistance'
export type { ImageDecoder, PixelGrid } from './similarity/imageDistance'
export { dispatchStamps } from './stamp/dispatchStamps'
export type { StampRenderer } from './stamp/dispatchStamps'
export { formatTimestamp } from './stamp/formatTimestamp'
export { advanceClock, createClock, parseClockTime, parseDuration } from './time/clock'
export type { Clock } from './time/clock'
export { sequencePhases } from './time/sequencer'
export { createSeededRandom } from './utils/random'
export { createZipStream, streamZipToBuffer } from './zip/buildZip'
export type * from './types'
