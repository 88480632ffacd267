/**
 * @file Duplex Connection Types
 *
 * The minimal channel contract the connection manager drives. Any
 * WebSocket-capable client can back it; `openWebSocket` is the default.
 */

import type { JsonValue } from '../types.js'

export type FrameType = 'text' | 'binary' | 'close' | 'error'

/**
 * One inbound unit read from a connection.
 */
export interface Frame {
  type: FrameType
  /** Text for `text`, bytes for `binary`, close code for `close`, error for `error` */
  data: string | Uint8Array | number | Error | null
  /** Close reason, when the frame is a close frame */
  extra?: string
  /**
   * Parse a text frame as JSON.
   *
   * @throws {SyntaxError} If the frame is not valid JSON
   */
  json(): JsonValue
}

/**
 * A single open duplex channel.
 */
export interface Connection {
  readonly closed: boolean
  sendJson(message: JsonValue): Promise<void>
  /**
   * Wait for the next frame.
   *
   * @throws {ReceiveTimeoutError} If `timeoutMs` elapses first
   */
  receive(timeoutMs?: number): Promise<Frame>
  ping(): Promise<void>
  close(): Promise<void>
}

/**
 * Opens a connection, resolving once the handshake succeeded.
 *
 * Rejects with `HandshakeError` on a non-101 response and with
 * `ConnectionError` on network failures or when `signal` aborts the
 * handshake.
 */
export type ConnectionFactory = (
  url: string,
  headers: Record<string, string>,
  signal?: AbortSignal
) => Promise<Connection>
