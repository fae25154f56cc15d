/**
 * Bounded-concurrency map
 */

/**
 * Map over items with at most `limit` calls in flight. Results keep input
 * order. The first rejection rejects the whole map; workers stop taking new
 * items once that happens.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (limit < 1) throw new Error(`mapWithConcurrency: limit must be >= 1, got ${limit}`)

  const results = new Array<R>(items.length)
  let next = 0
  let failed = false

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++
      const item = items[index]
      if (item === undefined) continue
      try {
        results[index] = await fn(item, index)
      } catch (error: unknown) {
        failed = true
        throw error
      }
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker())
  await Promise.all(workers)
  return results
}
