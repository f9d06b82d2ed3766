/**
 * Run `iterator` over `items` with at most `limit` calls in flight.
 * Results land at their input index, so callers see the original order
 * no matter which call finishes first.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  iterator: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`)
  }

  const results: R[] = new Array(items.length)
  let cursor = 0

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const current = cursor
      cursor += 1
      results[current] = await iterator(items[current], current)
    }
  }

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker))
  return results
}
