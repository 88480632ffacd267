/**
 * @file Cloud Relay Connection
 *
 * The bidirectional relay session: the hub sends requests and awaits the
 * correlated replies, and the relay pushes requests that are dispatched to
 * the registered handlers.
 *
 * @example
 * ```typescript
 * const iot = new CloudIoT(cloud)
 * void iot.connect()
 *
 * const reply = await iot.sendRequest('sync', { devices: [] })
 * await iot.disconnect()
 * ```
 */

import { ConnectionClosedError, NotConnectedError, toError } from '../errors.js'
import { errorData } from '../logger.js'
import type { CloudContext, JsonValue } from '../types.js'
import { BaseIoT, type BaseIoTOptions } from './base-iot.js'
import { createDefaultHandlers } from './builtin-handlers.js'
import { newMsgid, parseEnvelope, type Envelope, type RequestEnvelope } from './envelope.js'
import { dispatchMessage, type Handler, type HandlerRegistry } from './handlers.js'
import { PendingCalls } from './pending-calls.js'

export interface CloudIoTOptions extends BaseIoTOptions {
  /** Handlers for relay initiated requests. Defaults to `createDefaultHandlers()`. */
  handlers?: HandlerRegistry<CloudContext>
}

export interface SendRequestOptions {
  /** Wait for the correlated reply. Defaults to `true`. */
  expectReply?: boolean
  /** Abort waiting for the connection or the reply */
  signal?: AbortSignal
}

export class CloudIoT extends BaseIoT {
  private readonly pending = new PendingCalls()
  private readonly handlers: HandlerRegistry<CloudContext>

  /** Handler invocations still running */
  private readonly handlerTasks = new Set<Promise<void>>()

  constructor(cloud: CloudContext, options: CloudIoTOptions = {}) {
    const { handlers, ...baseOptions } = options
    super(cloud, 'cloud-iot', baseOptions)
    this.handlers = handlers ?? createDefaultHandlers(this.logger)

    this.registerOnDisconnect(async () => {
      const failed = this.pending.rejectSent(new ConnectionClosedError())
      if (failed > 0) {
        this.logger.warn('Connection closed with requests awaiting a reply', { failed })
      }
    })
  }

  get serverUrl(): string {
    return `wss://${this.cloud.servers.relayer}/websocket`
  }

  /** Requests still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.size
  }

  registerHandler(kind: string, handler: Handler<CloudContext>): void {
    this.handlers.register(kind, handler)
  }

  /**
   * Sends a request to the relay. Starts the connection loop if it is not
   * running and waits for it to connect.
   *
   * @returns The reply payload, or `null` when `expectReply` is `false`
   * @throws {NotConnectedError} If the loop stops before connecting
   * @throws {ErrorResponse} If the relay answers with an error
   * @throws {ConnectionClosedError} If the connection drops before the reply
   * @throws {RequestAbortedError} If `signal` aborts first
   */
  async sendRequest(kind: string, payload: JsonValue, options: SendRequestOptions = {}): Promise<JsonValue> {
    const { expectReply = true, signal } = options

    await this.startIfDisconnected()
    await this.waitForConnected(signal)

    const msgid = newMsgid()
    const message: RequestEnvelope = { msgid, handler: kind, payload }

    if (!expectReply) {
      await this.sendJson(message)
      return null
    }

    const reply = this.pending.create(msgid, { signal })
    const sending = this.sendJson(message).then(
      () => this.pending.markSent(msgid),
      (error: unknown) => {
        this.pending.reject(msgid, toError(error))
        throw error
      }
    )
    const [, result] = await Promise.all([sending, reply])
    return result
  }

  /** Resolves once every running handler has finished and replied. */
  async idle(): Promise<void> {
    while (this.handlerTasks.size > 0) {
      await Promise.all([...this.handlerTasks])
    }
  }

  protected handleMessage(message: JsonValue): void {
    const envelope = parseEnvelope(message)
    if (!envelope) {
      this.logger.warn('Received message without a valid envelope', { message })
      return
    }

    if (this.pending.resolveReply(envelope)) return

    if (envelope.handler === undefined) {
      this.logger.warn('Received reply for unknown request', { msgid: envelope.msgid })
      return
    }

    const task = this.runHandler(envelope)
    this.handlerTasks.add(task)
    void task.finally(() => this.handlerTasks.delete(task))
  }

  private async runHandler(envelope: Envelope): Promise<void> {
    const reply = await dispatchMessage(this.handlers, this.cloud, envelope, this.logger)
    if (!reply) return

    try {
      await this.sendJson(reply)
    } catch (error) {
      if (error instanceof NotConnectedError) {
        this.logger.warn('Connection closed before the reply could be sent', { msgid: envelope.msgid })
      } else {
        this.logger.error('Unable to send reply', { msgid: envelope.msgid, ...errorData(error) })
      }
    }
  }
}
