/**
 * @file Shared Types
 *
 * Types shared between the connection manager, the correlator and the
 * dispatch registry, plus the interfaces of the collaborators this package
 * consumes but does not implement (auth, the hub client, remote access).
 */

// =============================================================================
// JSON
// =============================================================================

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

// =============================================================================
// Connection State
// =============================================================================

/**
 * Observable state of a connection manager.
 *
 * `closing` is reported from the moment `disconnect()` is requested until
 * the manager loop has fully stopped.
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closing'

/**
 * Why the last socket session ended.
 */
export interface DisconnectReason {
  /** True when the session ended normally after being connected */
  clean: boolean
  reason: string
}

/**
 * Async lifecycle callback registered with `registerOnConnect` /
 * `registerOnDisconnect`.
 */
export type LifecycleCallback = () => Promise<void>

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger interface for relay output.
 *
 * All methods are optional; missing methods are treated as no-ops. A
 * `LogContext` from `@rocicorp/logger` satisfies this interface directly.
 *
 * @example
 * ```typescript
 * const logger: RelayLogger = {
 *   warn: (msg, data) => winston.warn(msg, data),
 *   error: (msg, data) => winston.error(msg, data),
 * }
 * ```
 */
export interface RelayLogger {
  debug?: (message: string, data?: Record<string, unknown>) => void
  info?: (message: string, data?: Record<string, unknown>) => void
  warn?: (message: string, data?: Record<string, unknown>) => void
  error?: (message: string, data?: Record<string, unknown>) => void
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Token bookkeeping owned by the auth layer.
 */
export interface CloudAuth {
  /**
   * Make sure the id token is valid, refreshing it if needed.
   *
   * Throws `UnauthenticatedError` when the credentials are no longer
   * accepted, or another `CloudError` on transient failures.
   */
  ensureValidToken(): Promise<void>
}

/**
 * Hub-side integration points invoked by the relay.
 */
export interface CloudClient {
  /** Show a persistent, human readable notification to the user. */
  userMessage(identifier: string, title: string, message: string): void
  alexaMessage(payload: JsonValue): Promise<JsonValue>
  googleMessage(payload: JsonValue): Promise<JsonValue>
  webhookMessage(payload: JsonValue): Promise<JsonValue>
  systemMessage(payload: JsonValue): Promise<void>
}

/**
 * Remote access tunnel, started on demand by the relay.
 */
export interface RemoteAccess {
  /** SNI server the peer should route the caller to. */
  readonly sniServer: string | null
  handleConnectionRequest(callerIp: string): Promise<void>
  disconnect(): Promise<void>
}

/**
 * Host names of the relay endpoints.
 */
export interface CloudServers {
  relayer: string
  remoteState: string
}

/**
 * Everything the connection managers need from the surrounding cloud
 * integration.
 */
export interface CloudContext {
  readonly auth: CloudAuth
  /** Current bearer token, valid after `auth.ensureValidToken()` resolves. */
  readonly idToken: string | null
  readonly subscriptionExpired: boolean
  readonly client: CloudClient
  readonly servers: CloudServers
  readonly remote?: RemoteAccess
  logout(): Promise<void>
}
