/**
 * Resilience helpers
 *
 * Abortable delays, timeouts and bounded concurrency for stage execution.
 */

import { setTimeout as sleep } from 'timers/promises'
import { CancellationError } from '../pipelines/errors'

/**
 * Wait for `ms`, rejecting with CancellationError when the signal aborts
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new CancellationError()
  }
  try {
    await sleep(ms, undefined, { signal })
  } catch (error) {
    if (signal?.aborted) {
      throw new CancellationError()
    }
    throw error
  }
}

/**
 * Execute with timeout
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  timeoutMessage?: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  try {
    return await Promise.race([
      fn(),
      new Promise<T>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(timeoutMessage || `Operation timed out after ${timeoutMs}ms`)),
          timeoutMs
        )
      }),
    ])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Run tasks with at most `limit` in flight; results keep input order
 */
export async function runBounded<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results = new Array<T>(tasks.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++
      results[index] = await tasks[index]()
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, tasks.length)) }, () => worker())
  await Promise.all(workers)
  return results
}
