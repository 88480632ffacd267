/**
 * @file Bounded Queue
 *
 * FIFO with a fixed capacity and a single asynchronous consumer. Pushing
 * into a full queue evicts the oldest item and hands it back to the caller.
 */

import { resolver, type Resolver } from '@rocicorp/resolver'

export class BoundedQueue<T> {
  readonly capacity: number

  private items: T[] = []

  /** The consumer suspended in `get()` */
  private waiter: Resolver<T | undefined> | null = null

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  get size(): number {
    return this.items.length
  }

  /**
   * Appends an item.
   *
   * @returns The evicted oldest item when the queue was full
   */
  push(item: T): T | undefined {
    if (this.deliver(item)) return undefined

    let evicted: T | undefined
    if (this.items.length >= this.capacity) {
      evicted = this.items.shift()
    }
    this.items.push(item)
    return evicted
  }

  /**
   * Puts an item back at the head of the queue.
   *
   * @returns `false` if the queue is full; the item is then the oldest
   * candidate and is not stored
   */
  unshift(item: T): boolean {
    if (this.deliver(item)) return true
    if (this.items.length >= this.capacity) return false
    this.items.unshift(item)
    return true
  }

  /**
   * Takes the oldest item, waiting for one if the queue is empty.
   *
   * Resolves `undefined` when `signal` aborts first.
   */
  get(signal?: AbortSignal): Promise<T | undefined> {
    const head = this.items.shift()
    if (head !== undefined) return Promise.resolve(head)
    if (signal?.aborted) return Promise.resolve(undefined)

    const waiter = resolver<T | undefined>()
    this.waiter = waiter
    const onAbort = () => {
      if (this.waiter === waiter) {
        this.waiter = null
        waiter.resolve(undefined)
      }
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    return waiter.promise.finally(() => signal?.removeEventListener('abort', onAbort))
  }

  /**
   * Drops every queued item matching `predicate`.
   *
   * @returns The number of items removed
   */
  remove(predicate: (item: T) => boolean): number {
    const before = this.items.length
    this.items = this.items.filter((item) => !predicate(item))
    return before - this.items.length
  }

  private deliver(item: T): boolean {
    const waiter = this.waiter
    if (!waiter) return false
    this.waiter = null
    waiter.resolve(item)
    return true
  }
}
