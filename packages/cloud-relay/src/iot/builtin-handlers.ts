/**
 * @file Built-in Relay Handlers
 *
 * Handlers for the request kinds the relay sends to every hub. Each one
 * forwards to the matching `CloudContext` collaborator.
 */

import { z } from 'zod'
import { HandlerError } from '../errors.js'
import { NOTIFICATION_MESSAGE_ID } from '../messages.js'
import type { CloudContext } from '../types.js'
import type { BoundLogger } from '../logger.js'
import { HandlerRegistry, type Handler } from './handlers.js'

// =============================================================================
// Payload Schemas
// =============================================================================

const cloudActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('logout'), reason: z.string().optional() }),
  z.object({
    action: z.enum(['user_notification', 'critical_user_notification']),
    title: z.string(),
    message: z.string(),
  }),
  z.object({ action: z.literal('disconnect_remote') }),
])

const remoteSniSchema = z.object({
  ip_address: z.string().min(1),
})

// =============================================================================
// Handlers
// =============================================================================

/**
 * `cloud` kind: account level actions pushed by the relay. Unknown actions
 * are logged and ignored.
 */
export function createCloudHandler(logger: BoundLogger): Handler<CloudContext> {
  return async (cloud, payload) => {
    const parsed = cloudActionSchema.safeParse(payload)
    if (!parsed.success) {
      logger.warn('Received unknown cloud action', { payload })
      return
    }

    const action = parsed.data
    switch (action.action) {
      case 'logout':
        await cloud.logout()
        logger.error(`You have been logged out from the cloud: ${action.reason ?? 'no reason given'}`)
        return
      case 'user_notification':
      case 'critical_user_notification':
        cloud.client.userMessage(NOTIFICATION_MESSAGE_ID, action.title, action.message)
        return
      case 'disconnect_remote':
        if (cloud.remote) {
          await cloud.remote.disconnect()
        }
        return
    }
  }
}

/** `remote_sni` kind: the relay asks for the SNI server a caller should use. */
export const handleRemoteSni: Handler<CloudContext> = async (cloud, payload) => {
  const { ip_address: callerIp } = remoteSniSchema.parse(payload)
  const remote = cloud.remote
  if (!remote) {
    throw new HandlerError('remote-not-available')
  }
  await remote.handleConnectionRequest(callerIp)
  return { server: remote.sniServer }
}

export const handleAlexa: Handler<CloudContext> = (cloud, payload) => cloud.client.alexaMessage(payload)

export const handleGoogleActions: Handler<CloudContext> = (cloud, payload) =>
  cloud.client.googleMessage(payload)

export const handleWebhook: Handler<CloudContext> = (cloud, payload) => cloud.client.webhookMessage(payload)

export const handleSystem: Handler<CloudContext> = async (cloud, payload) => {
  await cloud.client.systemMessage(payload)
}

/**
 * Registry preloaded with the built-in kinds.
 *
 * @example
 * ```typescript
 * const handlers = createDefaultHandlers(logger).register('custom', myHandler)
 * const iot = new CloudIoT(cloud, { handlers })
 * ```
 */
export function createDefaultHandlers(logger: BoundLogger): HandlerRegistry<CloudContext> {
  return new HandlerRegistry<CloudContext>([
    ['alexa', handleAlexa],
    ['google_actions', handleGoogleActions],
    ['cloud', createCloudHandler(logger)],
    ['remote_sni', handleRemoteSni],
    ['webhook', handleWebhook],
    ['system', handleSystem],
  ])
}
