/**
 * @file Pending Call Registry
 *
 * Tracks callers waiting for a reply, keyed by correlation id. Replies read
 * by the receive loop settle the matching entry; every settle path removes
 * the entry from the map.
 *
 * @example
 * ```typescript
 * const calls = new PendingCalls()
 * const reply = calls.create(msgid, { signal })
 * await connection.sendJson({ msgid, handler: 'ping', payload: {} })
 * calls.markSent(msgid)
 * await reply
 * ```
 */

import { resolver, type Resolver } from '@rocicorp/resolver'
import { ErrorResponse, IllegalStateError, ReplyTimeoutError, RequestAbortedError } from '../errors.js'
import type { JsonValue } from '../types.js'
import type { Envelope } from './envelope.js'

/**
 * A caller waiting for a reply.
 */
export interface PendingCall {
  msgid: string
  resolver: Resolver<JsonValue>
  /** True once the request reached the wire */
  sent: boolean
}

export interface CreateCallOptions {
  /** Abort waiting for the reply; the entry is removed and the call rejects. */
  signal?: AbortSignal
}

/**
 * Builds the error for a reply that carries an `error` field.
 */
export function errorFromReply(envelope: Envelope): ErrorResponse {
  const code = envelope.error ?? 'unknown'
  if (code === 'timeout') {
    return new ReplyTimeoutError(envelope.message)
  }
  return new ErrorResponse(code, envelope.message)
}

export class PendingCalls {
  private readonly calls = new Map<string, PendingCall>()

  /** Number of callers still waiting. */
  get size(): number {
    return this.calls.size
  }

  has(msgid: string): boolean {
    return this.calls.has(msgid)
  }

  /**
   * Registers a call and returns the promise of its reply.
   *
   * @throws {IllegalStateError} If `msgid` is already pending
   */
  create(msgid: string, options: CreateCallOptions = {}): Promise<JsonValue> {
    const { signal } = options
    if (this.calls.has(msgid)) {
      throw new IllegalStateError(`Correlation id ${msgid} is already pending`)
    }
    if (signal?.aborted) {
      return Promise.reject(new RequestAbortedError(msgid, { cause: signal.reason }))
    }

    const call: PendingCall = {
      msgid,
      resolver: resolver<JsonValue>(),
      sent: false,
    }
    this.calls.set(msgid, call)

    const onAbort = () => {
      this.settle(msgid, new RequestAbortedError(msgid, { cause: signal?.reason }))
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    return (async () => {
      try {
        return await call.resolver.promise
      } finally {
        signal?.removeEventListener('abort', onAbort)
        if (this.calls.get(msgid) === call) {
          this.calls.delete(msgid)
        }
      }
    })()
  }

  markSent(msgid: string): void {
    const call = this.calls.get(msgid)
    if (call) call.sent = true
  }

  /**
   * Settles the call a reply belongs to.
   *
   * @returns `false` if no call is waiting on `envelope.msgid`
   */
  resolveReply(envelope: Envelope): boolean {
    if (!this.calls.has(envelope.msgid)) return false
    if ('payload' in envelope) {
      return this.settle(envelope.msgid, null, envelope.payload ?? null)
    }
    return this.settle(envelope.msgid, errorFromReply(envelope))
  }

  /** Rejects one call. */
  reject(msgid: string, error: Error): boolean {
    return this.settle(msgid, error)
  }

  /**
   * Rejects every call whose request already reached the wire.
   *
   * @returns The number of calls rejected
   */
  rejectSent(error: Error): number {
    let count = 0
    for (const call of [...this.calls.values()]) {
      if (call.sent && this.settle(call.msgid, error)) count++
    }
    return count
  }

  private settle(msgid: string, error: Error | null, value: JsonValue = null): boolean {
    const call = this.calls.get(msgid)
    if (!call) return false
    this.calls.delete(msgid)
    if (error) {
      call.resolver.reject(error)
    } else {
      call.resolver.resolve(value)
    }
    return true
  }
}
