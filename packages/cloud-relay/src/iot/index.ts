/**
 * @file IoT Module Exports
 *
 * Connection managers, the request correlator and the handler registry.
 *
 * @example
 * ```typescript
 * import { CloudIoT, ReportStateSender } from 'cloud-relay/iot'
 * ```
 */

// =============================================================================
// Connection Managers
// =============================================================================

export { BaseIoT } from './base-iot.js'
export type { BaseIoTOptions } from './base-iot.js'

export { CloudIoT } from './cloud-iot.js'
export type { CloudIoTOptions, SendRequestOptions } from './cloud-iot.js'

export { ReportStateSender } from './report-state.js'
export type { SendMessageOptions } from './report-state.js'

// =============================================================================
// Correlation and Dispatch
// =============================================================================

export { PendingCalls, errorFromReply } from './pending-calls.js'
export type { PendingCall, CreateCallOptions } from './pending-calls.js'

export { HandlerRegistry, dispatchMessage } from './handlers.js'
export type { Handler } from './handlers.js'

export {
  createDefaultHandlers,
  createCloudHandler,
  handleAlexa,
  handleGoogleActions,
  handleRemoteSni,
  handleSystem,
  handleWebhook,
} from './builtin-handlers.js'

export { envelopeSchema, parseEnvelope, newMsgid } from './envelope.js'
export type { Envelope, RequestEnvelope, ReplyEnvelope } from './envelope.js'

// =============================================================================
// Utilities
// =============================================================================

export { BoundedQueue } from './bounded-queue.js'
export { RetryTimer, retryDelay } from './backoff.js'
export type { RandomSource } from './backoff.js'
export { gatherCallbacks } from './callbacks.js'
