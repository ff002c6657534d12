async function* toAsyncIterator<T>(items: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T> {
  yield* items
}

/**
 * Bounded worker pool over an async iterable.
 * Stops pulling new items once the signal aborts; items already started run to completion.
 */
export async function runWithConcurrency<T>(
  items: AsyncIterable<T> | Iterable<T>,
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`)
  }

  const iterator = toAsyncIterator(items)
  let exhausted = false

  const runWorker = async (): Promise<void> => {
    while (!exhausted && !signal?.aborted) {
      // async generators queue concurrent next() calls
      const result = await iterator.next()
      if (result.done) {
        exhausted = true
        return
      }
      await worker(result.value)
    }
  }

  try {
    await Promise.all(Array.from({ length: concurrency }, () => runWorker()))
  } finally {
    if (!exhausted) {
      await iterator.return(undefined)
    }
  }
}
