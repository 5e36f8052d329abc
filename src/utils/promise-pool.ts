/**
 * Map async jobs over a fixed number of lanes, keeping results in input order.
 *
 * Each lane pulls the next index until the list is exhausted, so the result slot
 * of a job is its input index whatever order jobs finish in. The returned promise
 * settles only after every started job has settled.
 */

export async function mapPromisePool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency))
  const results = new Array<R>(items.length)
  let next = 0
  let failure: { error: unknown } | undefined

  async function lane(): Promise<void> {
    // Stop pulling new jobs once one has failed.
    while (!failure && next < items.length) {
      const index = next++
      try {
        results[index] = await worker(items[index], index)
      } catch (error) {
        failure ??= { error }
      }
    }
  }

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane())
  await Promise.all(lanes)

  if (failure) throw failure.error
  return results
}
