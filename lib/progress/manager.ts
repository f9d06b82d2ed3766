interface ProgressEvent {
  runId: string
  progress: number
  label: string
  step: 'starting' | 'listing' | 'comparing' | 'allocating' | 'sequencing' | 'stamping' | 'complete'
  details?: {
    phase?: string
    processed?: number
    total?: number
  }
}

type ProgressListener = (event: ProgressEvent) => void

/**
 * Bind a run id to a listener so pipeline steps only pass what changed.
 * Listener errors are reported and never interrupt the run.
 */
export function createProgressReporter(runId: string, listener?: ProgressListener) {
  return (
    progress: number,
    label: string,
    step: ProgressEvent['step'],
    details?: ProgressEvent['details']
  ): void => {
    if (!listener) return
    try {
      listener({ runId, progress: Math.max(0, Math.min(100, progress)), label, step, details })
    } catch (error) {
      console.error('Error sending progress update:', error)
    }
  }
}

export function logProgressEvent(event: ProgressEvent): void {
  const detail = event.details?.total !== undefined
    ? ` (${event.details.processed ?? 0}/${event.details.total})`
    : ''
  console.log(`[${String(Math.round(event.progress)).padStart(3)}%] ${event.label}${detail}`)
}

export type { ProgressEvent, ProgressListener }
