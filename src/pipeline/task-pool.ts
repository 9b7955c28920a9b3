import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { requirePositiveInteger } from '../utils/errors.js'

/**
 * Limits how many async tasks are in flight at once. Tasks still run on
 * this thread; work that has to run in parallel goes through a task that
 * hands it to another thread.
 *
 * Each task starts on a fresh turn of the event loop, so a long queue never
 * starves pending I/O callbacks.
 */
export class TaskPool {
  readonly concurrency: number
  private active = 0
  private readonly waiting: Array<() => void> = []

  constructor(concurrency: number) {
    this.concurrency = requirePositiveInteger(concurrency, 'concurrency')
  }

  /** Tasks currently running */
  get size(): number {
    return this.active
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.waiting.length
  }

  async run<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire()
    try {
      await yieldToEventLoop()
      return await task()
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve)
    })
  }

  private release(): void {
    const next = this.waiting.shift()
    // The slot passes straight to the next waiter
    if (next) next()
    else this.active--
  }
}

/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep input order; a rejection settles only its own slot.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  requirePositiveInteger(concurrency, 'concurrency')
  const results: PromiseSettledResult<R>[] = new Array(items.length)
  let cursor = 0

  async function work(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) }
      } catch (reason) {
        results[index] = { status: 'rejected', reason }
      }
    }
  }

  await Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, work)
  )
  return results
}
