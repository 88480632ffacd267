/**
 * cloud-relay
 *
 * Keeps a hub connected to its cloud relay: a reconnecting duplex
 * connection manager, request/response correlation over it, dispatch of
 * relay initiated requests, and an ordered report-state sender.
 *
 * @packageDocumentation
 * @module cloud-relay
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  ConnectionState,
  DisconnectReason,
  LifecycleCallback,
  LogLevel,
  RelayLogger,
  CloudAuth,
  CloudClient,
  CloudContext,
  CloudServers,
  RemoteAccess,
} from './types.js'

// ============================================================================
// Connection Managers
// ============================================================================

export * from './iot/index.js'

// ============================================================================
// Transport
// ============================================================================

export * from './connection/index.js'

// ============================================================================
// Configuration and Logging
// ============================================================================

export { DEFAULT_IOT_CONFIG, iotConfigSchema, resolveIoTConfig } from './config.js'
export type { IoTConfig, IoTConfigInput } from './config.js'

export { createDefaultLogger } from './logger.js'

export {
  MESSAGE_AUTH_FAIL,
  MESSAGE_EXPIRATION,
  NOTIFICATION_MESSAGE_ID,
  USER_MESSAGE_ID,
  USER_MESSAGE_TITLE,
} from './messages.js'

// ============================================================================
// Errors
// ============================================================================

export {
  RelayError,
  NotConnectedError,
  IllegalStateError,
  ConfigError,
  CloudError,
  UnauthenticatedError,
  HandshakeError,
  ConnectionError,
  ConnectionClosedError,
  ReceiveTimeoutError,
  ErrorResponse,
  ReplyTimeoutError,
  DiscardedError,
  RequestAbortedError,
  UnknownHandlerError,
  HandlerError,
} from './errors.js'
