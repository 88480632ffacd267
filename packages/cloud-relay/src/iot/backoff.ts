/**
 * @file Reconnect Backoff
 *
 * Randomized exponential backoff between reconnect attempts, and the
 * cancellable sleep the manager waits in.
 */

import { resolver, type Resolver } from '@rocicorp/resolver'

/** Source of uniform randomness in `[0, 1)`. */
export type RandomSource = () => number

/**
 * Seconds to wait before reconnect attempt number `tries`.
 *
 * `2 ** min(tries, maxExponent)` plus an integer jitter drawn uniformly from
 * `0..tries * 3` inclusive.
 *
 * @example
 * ```typescript
 * retryDelay(3, () => 0)      // 8
 * retryDelay(3, () => 0.999)  // 17
 * retryDelay(20, () => 0)     // 512
 * ```
 */
export function retryDelay(tries: number, random: RandomSource = Math.random, maxExponent = 9): number {
  const base = 2 ** Math.min(tries, maxExponent)
  const jitter = Math.floor(random() * (tries * 3 + 1))
  return base + jitter
}

/**
 * A sleep that can be cut short from outside.
 *
 * Only one wait is active at a time; `cancel()` ends it early.
 */
export class RetryTimer {
  private timer: ReturnType<typeof setTimeout> | undefined
  private pending: Resolver<boolean> | null = null

  /** True while a wait is in progress. */
  get active(): boolean {
    return this.pending !== null
  }

  /**
   * Sleeps for `ms` milliseconds.
   *
   * @returns `true` if the full delay elapsed, `false` if cancelled
   */
  wait(ms: number): Promise<boolean> {
    this.cancel()
    const pending = resolver<boolean>()
    this.pending = pending
    this.timer = setTimeout(() => this.settle(true), ms)
    return pending.promise
  }

  /** Ends the current wait, if any. Safe to call repeatedly. */
  cancel(): void {
    this.settle(false)
  }

  private settle(elapsed: boolean): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    const pending = this.pending
    this.pending = null
    pending?.resolve(elapsed)
  }
}
