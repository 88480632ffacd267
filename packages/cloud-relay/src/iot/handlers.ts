/**
 * @file Handler Dispatch Registry
 *
 * Maps the `handler` field of peer initiated requests to async functions
 * and turns their outcome into a reply envelope.
 *
 * @example
 * ```typescript
 * const registry = new HandlerRegistry<CloudContext>()
 *   .register('webhook', (cloud, payload) => cloud.client.webhookMessage(payload))
 *
 * const reply = await dispatchMessage(registry, cloud, envelope, logger)
 * if (reply) await iot.sendJson(reply)
 * ```
 */

import { HandlerError, UnknownHandlerError } from '../errors.js'
import type { BoundLogger } from '../logger.js'
import { errorData } from '../logger.js'
import type { JsonValue } from '../types.js'
import type { Envelope, ReplyEnvelope } from './envelope.js'

/**
 * Processes one peer request. Resolving `undefined` or `null` means no
 * reply is sent.
 */
export type Handler<TContext> = (context: TContext, payload: JsonValue) => Promise<JsonValue | void>

function isReplyPayload(value: JsonValue | void): value is JsonValue {
  return value !== undefined && value !== null
}

export class HandlerRegistry<TContext> {
  private readonly handlers = new Map<string, Handler<TContext>>()

  constructor(entries?: Iterable<readonly [string, Handler<TContext>]>) {
    for (const [kind, handler] of entries ?? []) {
      this.handlers.set(kind, handler)
    }
  }

  /** Registers `handler` for `kind`, replacing any previous one. */
  register(kind: string, handler: Handler<TContext>): this {
    this.handlers.set(kind, handler)
    return this
  }

  unregister(kind: string): boolean {
    return this.handlers.delete(kind)
  }

  has(kind: string): boolean {
    return this.handlers.has(kind)
  }

  get kinds(): string[] {
    return [...this.handlers.keys()]
  }

  /**
   * Runs the handler registered for `kind`.
   *
   * @throws {UnknownHandlerError} If nothing is registered for `kind`
   */
  async invoke(context: TContext, kind: string, payload: JsonValue): Promise<JsonValue | void> {
    const handler = this.handlers.get(kind)
    if (!handler) {
      throw new UnknownHandlerError(kind)
    }
    return handler(context, payload)
  }
}

/**
 * Runs the handler for a peer request and builds the reply.
 *
 * Never throws. A `HandlerError` is answered with its code; any other
 * failure is logged here and reported to the peer only as `exception`.
 *
 * @returns The reply to send, or `null` when no reply is expected
 */
export async function dispatchMessage<TContext>(
  registry: HandlerRegistry<TContext>,
  context: TContext,
  envelope: Envelope,
  logger: BoundLogger
): Promise<ReplyEnvelope | null> {
  const { msgid } = envelope
  const kind = envelope.handler ?? ''

  try {
    const result = await registry.invoke(context, kind, envelope.payload ?? null)
    if (!isReplyPayload(result)) {
      return null
    }
    return { msgid, payload: result }
  } catch (error) {
    if (error instanceof UnknownHandlerError) {
      logger.warn('Received request for unknown handler', { msgid, handler: kind })
      return { msgid, error: 'unknown-handler' }
    }
    if (error instanceof HandlerError) {
      logger.debug('Handler rejected message', { msgid, handler: kind, code: error.code })
      return { msgid, error: error.code }
    }
    logger.error('Error handling message', { msgid, handler: kind, ...errorData(error) })
    return { msgid, error: 'exception' }
  }
}
