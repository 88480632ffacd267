/**
 * @file WebSocket Connection
 *
 * `Connection` implementation on top of the `ws` client. Inbound events are
 * buffered as frames so the manager can pull them one at a time with
 * `receive()`.
 *
 * @example
 * ```typescript
 * const connection = await openWebSocket('wss://relay.example.com/websocket', {
 *   Authorization: `Bearer ${token}`,
 * })
 * const frame = await connection.receive()
 * ```
 */

import type { IncomingMessage } from 'node:http'
import { resolver, type Resolver } from '@rocicorp/resolver'
import WebSocket, { type RawData } from 'ws'
import { ConnectionError, HandshakeError, ReceiveTimeoutError } from '../errors.js'
import type { JsonValue } from '../types.js'
import { binaryFrame, closeFrame, errorFrame, textFrame } from './frames.js'
import type { Connection, ConnectionFactory, Frame } from './types.js'

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data
  if (Array.isArray(data)) return Buffer.concat(data)
  return Buffer.from(data)
}

// =============================================================================
// WebSocketConnection
// =============================================================================

/**
 * An open `ws` socket exposed as a pull-based `Connection`.
 */
export class WebSocketConnection implements Connection {
  private readonly ws: WebSocket

  /** Frames received but not yet consumed */
  private frames: Frame[] = []

  /** The receiver currently suspended in `receive()` */
  private waiter: Resolver<Frame> | null = null

  /** Set once a close or error frame was produced, or `close()` was called */
  private ended = false

  constructor(ws: WebSocket) {
    this.ws = ws
    ws.on('message', (data: RawData, isBinary: boolean) => {
      const bytes = toBuffer(data)
      this.push(isBinary ? binaryFrame(new Uint8Array(bytes)) : textFrame(bytes.toString('utf8')))
    })
    ws.on('close', (code: number, reason: Buffer) => {
      this.push(closeFrame(code, reason.toString('utf8')))
    })
    ws.on('error', (error: Error) => {
      this.push(errorFrame(error))
    })
  }

  get closed(): boolean {
    return this.ended && this.frames.length === 0
  }

  async sendJson(message: JsonValue): Promise<void> {
    if (this.ended || this.ws.readyState !== WebSocket.OPEN) {
      throw new ConnectionError('WebSocket is not open')
    }
    const data = JSON.stringify(message)
    await new Promise<void>((resolve, reject) => {
      this.ws.send(data, (error) => {
        if (error) {
          reject(new ConnectionError(`Send failed: ${error.message}`, { cause: error }))
        } else {
          resolve()
        }
      })
    })
  }

  receive(timeoutMs?: number): Promise<Frame> {
    const next = this.frames.shift()
    if (next) return Promise.resolve(next)
    if (this.ended) return Promise.resolve(closeFrame(1006, 'Connection ended'))

    const waiter = resolver<Frame>()
    this.waiter = waiter
    if (timeoutMs === undefined) return waiter.promise

    const timer = setTimeout(() => {
      if (this.waiter === waiter) {
        this.waiter = null
        waiter.reject(new ReceiveTimeoutError(timeoutMs))
      }
    }, timeoutMs)
    return waiter.promise.finally(() => clearTimeout(timer))
  }

  async ping(): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new ConnectionError('WebSocket is not open')
    }
    this.ws.ping()
  }

  async close(): Promise<void> {
    if (this.ended) return
    // Unblock the receiver right away; the server's close reply is not awaited.
    this.push(closeFrame(1000, 'Client disconnect'))
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, 'Client disconnect')
    }
  }

  private push(frame: Frame): void {
    if (this.ended) return
    if (frame.type === 'close' || frame.type === 'error') {
      this.ended = true
    }
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter.resolve(frame)
    } else {
      this.frames.push(frame)
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Default `ConnectionFactory`: opens a `ws` client and waits for the
 * handshake.
 */
export const openWebSocket: ConnectionFactory = (url, headers, signal) =>
  new Promise<Connection>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ConnectionError('Handshake aborted'))
      return
    }
    const ws = new WebSocket(url, { headers })
    let settled = false

    const onAbort = () => {
      if (settled) return
      settled = true
      reject(new ConnectionError('Handshake aborted'))
      ws.terminate()
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    // Stays attached through the handshake; errors after settling are the
    // echo of our own terminate().
    const onError = (error: Error) => {
      if (settled) return
      settled = true
      signal?.removeEventListener('abort', onAbort)
      reject(new ConnectionError(`Unable to connect: ${error.message}`, { cause: error }))
    }

    ws.on('error', onError)
    ws.once('unexpected-response', (_request: unknown, response: IncomingMessage) => {
      if (settled) return
      settled = true
      signal?.removeEventListener('abort', onAbort)
      reject(new HandshakeError(response.statusCode ?? 0))
      ws.terminate()
    })
    ws.once('open', () => {
      if (settled) return
      settled = true
      signal?.removeEventListener('abort', onAbort)
      ws.off('error', onError)
      resolve(new WebSocketConnection(ws))
    })
  })
