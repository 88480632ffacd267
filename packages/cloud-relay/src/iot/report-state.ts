/**
 * @file Report State Sender
 *
 * Pushes device state updates to the report-state endpoint. Messages are
 * queued while offline and written strictly in order, one at a time, once
 * the connection is up. When the queue is full the oldest message is
 * dropped and its caller fails with `DiscardedError`.
 *
 * ```
 * sendMessage() -> BoundedQueue -> pump -> sendJson -> ... -> reply -> caller
 *                      |
 *                      +-- overflow: oldest rejected with DiscardedError
 * ```
 */

import {
  ConnectionClosedError,
  ConnectionError,
  DiscardedError,
  NotConnectedError,
  RequestAbortedError,
  toError,
} from '../errors.js'
import { errorData } from '../logger.js'
import type { CloudContext, JsonValue } from '../types.js'
import { BaseIoT, type BaseIoTOptions } from './base-iot.js'
import { BoundedQueue } from './bounded-queue.js'
import { newMsgid, parseEnvelope } from './envelope.js'
import { PendingCalls } from './pending-calls.js'

type QueuedMessage = {
  msgid: string
  payload: JsonValue
}

export interface SendMessageOptions {
  /** Abort waiting for the reply; a message still queued is never sent. */
  signal?: AbortSignal
}

export class ReportStateSender extends BaseIoT {
  private readonly queue: BoundedQueue<QueuedMessage>
  private readonly pending = new PendingCalls()

  private pumpAbort: AbortController | null = null
  private pumpTask: Promise<void> | null = null

  constructor(cloud: CloudContext, options: BaseIoTOptions = {}) {
    super(cloud, 'report-state', options)
    this.queue = new BoundedQueue(this.config.maxPending)
    this.registerOnConnect(async () => this.startPump())
    this.registerOnDisconnect(async () => this.stopPump())
  }

  get serverUrl(): string {
    return `wss://${this.cloud.servers.remoteState}/v1`
  }

  /** Messages waiting to be written. */
  get queuedCount(): number {
    return this.queue.size
  }

  /** Messages waiting for a reply, queued or sent. */
  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Queues a state report and waits for the server's reply. Starts the
   * connection loop if it is not running.
   *
   * @throws {DiscardedError} If the message is evicted from a full queue
   * @throws {ErrorResponse} If the server answers with an error
   * @throws {ConnectionClosedError} If the connection drops after the send
   * @throws {RequestAbortedError} If `signal` aborts before the reply
   */
  async sendMessage(payload: JsonValue, options: SendMessageOptions = {}): Promise<JsonValue> {
    const { signal } = options
    if (signal?.aborted) throw new RequestAbortedError(undefined, { cause: signal.reason })

    await this.startIfDisconnected()

    const msgid = newMsgid()
    if (signal?.aborted) throw new RequestAbortedError(msgid, { cause: signal.reason })
    const reply = this.pending.create(msgid, { signal })

    const evicted = this.queue.push({ msgid, payload })
    if (evicted) {
      this.logger.warn('Outbound queue full, discarding oldest message', { msgid: evicted.msgid })
      this.pending.reject(evicted.msgid, new DiscardedError(evicted.msgid))
    }
    if (!signal) return reply

    // An aborted report gives its slot back
    const dequeue = () => {
      this.queue.remove((item) => item.msgid === msgid)
    }
    signal.addEventListener('abort', dequeue, { once: true })
    try {
      return await reply
    } finally {
      signal.removeEventListener('abort', dequeue)
    }
  }

  protected handleMessage(message: JsonValue): void {
    const envelope = parseEnvelope(message)
    if (envelope && this.pending.resolveReply(envelope)) return
    this.logger.warn('Got unhandled message', { message })
  }

  // ---------------------------------------------------------------------------
  // Pump
  // ---------------------------------------------------------------------------

  private startPump(): void {
    this.pumpAbort?.abort()
    const abort = new AbortController()
    this.pumpAbort = abort
    this.pumpTask = this.pump(abort.signal).catch((error: unknown) => {
      this.logger.error('Report state pump failed', errorData(error))
    })
  }

  private async stopPump(): Promise<void> {
    this.pumpAbort?.abort()
    this.pumpAbort = null
    const task = this.pumpTask
    this.pumpTask = null
    if (task) await task

    const failed = this.pending.rejectSent(new ConnectionClosedError())
    if (failed > 0) {
      this.logger.warn('Connection closed with reports awaiting a reply', { failed })
    }
  }

  private async pump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const item = await this.queue.get(signal)
      if (!item) return

      // Caller gave up while it was queued
      if (!this.pending.has(item.msgid)) continue

      if (signal.aborted) {
        this.requeue(item)
        return
      }

      try {
        await this.sendJson(item)
        this.pending.markSent(item.msgid)
      } catch (error) {
        if (error instanceof NotConnectedError || error instanceof ConnectionError) {
          this.requeue(item)
          return
        }
        this.pending.reject(item.msgid, toError(error))
      }
    }
  }

  private requeue(item: QueuedMessage): void {
    if (!this.pending.has(item.msgid)) return
    if (!this.queue.unshift(item)) {
      this.pending.reject(item.msgid, new DiscardedError(item.msgid))
    }
  }
}
