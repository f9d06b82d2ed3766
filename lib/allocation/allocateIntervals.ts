export interface AllocationOptions {
  /** Smallest separation (seconds) a pair may receive */
  minDelta?: number
}

/**
 * Split `totalDuration` across consecutive photo pairs in proportion to how
 * much the scene changed between them.
 *
 * - one delta per score; empty scores give an empty allocation
 * - all-zero scores split the budget equally
 * - pairs that would fall under `minDelta` are pinned to it and the remaining
 *   budget is re-spread over the others; an unreachable floor
 *   (minDelta * n > total) falls back to an equal split
 * - the last delta absorbs rounding so the sum is exactly `totalDuration`
 */
export function allocateIntervals(
  scores: readonly number[],
  totalDuration: number,
  options: AllocationOptions = {}
): number[] {
  if (!Number.isFinite(totalDuration) || totalDuration < 0) {
    throw new Error(`Duration budget must be a non-negative number of seconds, got ${totalDuration}`)
  }
  for (const [index, score] of scores.entries()) {
    if (!Number.isFinite(score) || score < 0) {
      throw new Error(`Dissimilarity score at pair ${index} must be a non-negative number, got ${score}`)
    }
  }

  const count = scores.length
  if (count === 0) return []

  const minDelta = Math.max(0, options.minDelta ?? 0)
  let deltas: number[]

  if (minDelta > 0 && minDelta * count > totalDuration) {
    deltas = equalSplit(count, totalDuration)
  } else if (minDelta > 0) {
    deltas = allocateWithFloor(scores, totalDuration, minDelta)
  } else {
    deltas = proportional(scores, totalDuration)
  }

  return absorbRemainder(deltas, totalDuration)
}

function equalSplit(count: number, total: number): number[] {
  return new Array<number>(count).fill(total / count)
}

function proportional(scores: readonly number[], total: number): number[] {
  const sum = scores.reduce((acc, score) => acc + score, 0)
  if (sum === 0) {
    return equalSplit(scores.length, total)
  }
  return scores.map(score => (total * score) / sum)
}

function allocateWithFloor(scores: readonly number[], total: number, minDelta: number): number[] {
  const pinned = new Set<number>()
  let deltas = proportional(scores, total)

  // Each pass pins at least one more pair or stops, so this ends within n passes
  while (true) {
    const newlyPinned = deltas
      .map((delta, index) => ({ delta, index }))
      .filter(({ delta, index }) => !pinned.has(index) && delta < minDelta)
      .map(({ index }) => index)

    if (newlyPinned.length === 0) break
    newlyPinned.forEach(index => pinned.add(index))

    const free = scores.map((_, index) => index).filter(index => !pinned.has(index))
    const remaining = total - pinned.size * minDelta
    const spread = proportional(free.map(index => scores[index]), remaining)

    deltas = scores.map(() => minDelta)
    free.forEach((index, position) => {
      deltas[index] = spread[position]
    })

    if (free.length === 0) break
  }

  return deltas
}

function absorbRemainder(deltas: number[], total: number): number[] {
  const result = [...deltas]
  const last = result.length - 1
  const head = result.slice(0, last).reduce((acc, delta) => acc + delta, 0)
  result[last] = Math.max(0, total - head)
  return result
}
