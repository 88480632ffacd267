import type { BoundLogger } from '../logger.js'
import { errorData } from '../logger.js'
import type { LifecycleCallback } from '../types.js'

/**
 * Runs every callback concurrently and waits for all of them. A failing
 * callback is logged and never affects the others.
 */
export async function gatherCallbacks(
  logger: BoundLogger,
  name: string,
  callbacks: readonly LifecycleCallback[]
): Promise<void> {
  const results = await Promise.allSettled(callbacks.map(async (callback) => callback()))
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.error(`Unexpected error in ${name} callback`, {
        index,
        ...errorData(result.reason),
      })
    }
  })
}
