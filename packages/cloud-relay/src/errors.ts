/**
 * @file Relay Error Classes
 *
 * Typed errors raised by the relay connection manager, the request
 * correlator and the dispatch registry.
 *
 * @example
 * ```typescript
 * import { ErrorResponse, DiscardedError } from 'cloud-relay'
 *
 * try {
 *   await reportState.sendMessage({ devices: {} })
 * } catch (error) {
 *   if (error instanceof DiscardedError) {
 *     // evicted from the outbound queue before it was sent
 *   } else if (error instanceof ErrorResponse) {
 *     console.log('Server rejected message:', error.code, error.message)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error raised by this package.
 */
export class RelayError extends Error {
  /** Machine readable error code */
  readonly code: string

  /** The original cause of this error, if any */
  override readonly cause?: unknown

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'RelayError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

/**
 * Raised by `sendJson` and request calls when no connection is open.
 */
export class NotConnectedError extends RelayError {
  constructor(message = 'Not connected') {
    super(message, 'not-connected')
    this.name = 'NotConnectedError'
  }
}

/**
 * Raised when `connect()` is called while the manager is not disconnected.
 */
export class IllegalStateError extends RelayError {
  constructor(message: string) {
    super(message, 'illegal-state')
    this.name = 'IllegalStateError'
  }
}

/**
 * Invalid configuration passed to a manager.
 */
export class ConfigError extends RelayError {
  /** Individual validation problems, one per offending field */
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid relay configuration: ${issues.join('; ')}`, 'config')
    this.name = 'ConfigError'
    this.issues = issues
  }
}

// =============================================================================
// Auth Errors
// =============================================================================

/**
 * Generic failure from the auth collaborator. Treated as transient.
 */
export class CloudError extends RelayError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? 'cloud', options)
    this.name = 'CloudError'
  }
}

/**
 * The stored credentials are no longer accepted. Treated as permanent.
 */
export class UnauthenticatedError extends CloudError {
  constructor(message = 'Unauthenticated', options?: { cause?: unknown }) {
    super(message, { ...options, code: 'unauthenticated' })
    this.name = 'UnauthenticatedError'
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * The server answered the WebSocket upgrade with something other than 101.
 */
export class HandshakeError extends RelayError {
  /** HTTP status returned by the server */
  readonly status: number

  constructor(status: number, message?: string) {
    super(message ?? `Unexpected handshake response: ${status}`, 'handshake')
    this.name = 'HandshakeError'
    this.status = status
  }
}

/**
 * Network level failure while opening or using a connection.
 */
export class ConnectionError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'connection', options)
    this.name = 'ConnectionError'
  }
}

/**
 * Fails calls that were on the wire when the connection dropped.
 */
export class ConnectionClosedError extends RelayError {
  constructor(message = 'Connection closed before a reply was received') {
    super(message, 'connection-closed')
    this.name = 'ConnectionClosedError'
  }
}

/**
 * No frame arrived within the idle window given to `Connection.receive`.
 */
export class ReceiveTimeoutError extends RelayError {
  /** The idle window in milliseconds */
  readonly timeout: number

  constructor(timeout: number) {
    super(`No frame received within ${timeout}ms`, 'receive-timeout')
    this.name = 'ReceiveTimeoutError'
    this.timeout = timeout
  }
}

// =============================================================================
// Per-call Errors
// =============================================================================

/**
 * The peer answered a request with an `error` field.
 *
 * @example
 * ```typescript
 * if (error instanceof ErrorResponse) {
 *   console.log(error.code, error.message)
 * }
 * ```
 */
export class ErrorResponse extends RelayError {
  constructor(code: string, message?: string) {
    super(message ?? `Error response from peer: ${code}`, code)
    this.name = 'ErrorResponse'
  }
}

/**
 * The peer reported that handling the request timed out on its side.
 */
export class ReplyTimeoutError extends ErrorResponse {
  constructor(message?: string) {
    super('timeout', message ?? 'Peer timed out handling the request')
    this.name = 'ReplyTimeoutError'
  }
}

/**
 * A queued message was evicted because the outbound queue was full.
 */
export class DiscardedError extends RelayError {
  /** Correlation id of the evicted message */
  readonly msgid: string

  constructor(msgid: string) {
    super(`Message ${msgid} discarded: outbound queue full`, 'discarded')
    this.name = 'DiscardedError'
    this.msgid = msgid
  }
}

/**
 * The caller aborted a pending request through its `AbortSignal`.
 */
export class RequestAbortedError extends RelayError {
  constructor(msgid?: string, options?: { cause?: unknown }) {
    super(msgid ? `Request ${msgid} aborted` : 'Request aborted', 'aborted', options)
    this.name = 'RequestAbortedError'
  }
}

/**
 * No handler is registered for the kind named by an inbound request.
 */
export class UnknownHandlerError extends RelayError {
  readonly kind: string

  constructor(kind: string) {
    super(`No handler registered for ${kind}`, 'unknown-handler')
    this.name = 'UnknownHandlerError'
    this.kind = kind
  }
}

/**
 * Thrown by a handler to answer the peer with a specific error code
 * instead of `exception`.
 *
 * @example
 * ```typescript
 * registry.register('webhook', async () => {
 *   throw new HandlerError('webhook-not-found')
 * })
 * ```
 */
export class HandlerError extends RelayError {
  constructor(code: string, message?: string) {
    super(message ?? `Handler failed: ${code}`, code)
    this.name = 'HandlerError'
  }
}

/**
 * Wraps a non-Error thrown value.
 *
 * @internal
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
