/**
 * @file Duplex Connection Manager
 *
 * Keeps one long lived connection to a relay server open: gate on auth and
 * subscription, open the socket, read frames until it drops, run the
 * lifecycle callbacks, back off and try again until `disconnect()` is called
 * or a permanent failure is hit.
 *
 * ## Connection State Machine
 *
 * ```
 *                      connect()
 *   +--------------+  ----------->  +--------------+
 *   | DISCONNECTED |                | CONNECTING   |<-----------+
 *   +--------------+                +--------------+            |
 *          ^                              |                     |
 *          |                              | handshake ok        | drop,
 *          |   close requested,           v                     | backoff
 *          |   auth or policy    +--------------+               |
 *          +---------------------| CONNECTED    |---------------+
 *                                +--------------+
 * ```
 *
 * `disconnect()` may be called in any state; the observable state reads
 * `closing` until the loop has reached `disconnected`.
 *
 * Subclasses supply the server URL and what to do with each inbound message.
 */

import { EventEmitter } from 'events'
import { Lock } from '@rocicorp/lock'
import { resolver, type Resolver } from '@rocicorp/resolver'
import { resolveIoTConfig, type IoTConfig, type IoTConfigInput } from '../config.js'
import type { Connection, ConnectionFactory, Frame } from '../connection/types.js'
import { openWebSocket } from '../connection/ws-connection.js'
import {
  ConnectionError,
  HandshakeError,
  IllegalStateError,
  NotConnectedError,
  ReceiveTimeoutError,
  RequestAbortedError,
  UnauthenticatedError,
} from '../errors.js'
import { bindLogger, createDefaultLogger, errorData, type BoundLogger } from '../logger.js'
import { MESSAGE_AUTH_FAIL, MESSAGE_EXPIRATION, USER_MESSAGE_ID, USER_MESSAGE_TITLE } from '../messages.js'
import type {
  CloudContext,
  ConnectionState,
  DisconnectReason,
  JsonValue,
  LifecycleCallback,
  RelayLogger,
} from '../types.js'
import { RetryTimer, retryDelay, type RandomSource } from './backoff.js'
import { gatherCallbacks } from './callbacks.js'

// =============================================================================
// Options
// =============================================================================

export interface BaseIoTOptions extends IoTConfigInput {
  /** Opens the duplex channel. Defaults to the `ws` client. */
  connectionFactory?: ConnectionFactory
  /** Defaults to a console `LogContext` at `logLevel`. */
  logger?: RelayLogger
  /** Jitter source for the backoff. Defaults to `Math.random`. */
  random?: RandomSource
}

type LoopState = Exclude<ConnectionState, 'closing'>

// =============================================================================
// BaseIoT
// =============================================================================

/**
 * Base class managing the connection to a relay server.
 *
 * @fires BaseIoT#stateChange - With the new `ConnectionState`
 * @fires BaseIoT#connect - After the connection is marked connected
 * @fires BaseIoT#disconnect - With the `DisconnectReason` after leaving connected
 */
export abstract class BaseIoT extends EventEmitter {
  protected readonly cloud: CloudContext
  protected readonly config: IoTConfig
  protected readonly logger: BoundLogger

  private readonly connectionFactory: ConnectionFactory
  private readonly random: RandomSource

  /** The open connection, owned by the loop */
  private connection: Connection | null = null

  /** Aborts an in-flight handshake */
  private handshakeAbort: AbortController | null = null

  /** Sleep between reconnect attempts */
  private readonly retryTimer = new RetryTimer()

  /** Set when the loop should stop after the current attempt */
  private closeRequested = false

  private _tries = 0
  private _state: LoopState = 'disconnected'
  private _lastDisconnectReason: DisconnectReason | null = null
  private emittedState: ConnectionState = 'disconnected'

  /** Resolved exactly once when the loop reaches `disconnected` */
  private stopped: Resolver<void> | null = null

  /** Shared by every caller waiting for the current attempt to connect */
  private connectWaiter: Resolver<void> | null = null

  /** Serializes the "check state, else start the loop" step of senders */
  private readonly connectLock = new Lock()

  private readonly onConnectCallbacks: LifecycleCallback[] = []
  private readonly onDisconnectCallbacks: LifecycleCallback[] = []

  constructor(cloud: CloudContext, component: string, options: BaseIoTOptions = {}) {
    super()
    const { connectionFactory, logger, random, ...config } = options
    this.cloud = cloud
    this.config = resolveIoTConfig(config)
    this.connectionFactory = connectionFactory ?? openWebSocket
    this.random = random ?? Math.random
    this.logger = bindLogger(logger ?? createDefaultLogger(component, this.config.logLevel))
  }

  // ---------------------------------------------------------------------------
  // Subclass hooks
  // ---------------------------------------------------------------------------

  /** URL of the server to connect to. */
  abstract get serverUrl(): string

  /**
   * Handles one inbound JSON message. Called from the receive loop; it must
   * not block, and any exception it throws is logged and swallowed.
   */
  protected abstract handleMessage(message: JsonValue): void

  /** Whether an active subscription is needed to connect. */
  get requireSubscription(): boolean {
    return this.config.requireSubscription
  }

  // ---------------------------------------------------------------------------
  // Observable state
  // ---------------------------------------------------------------------------

  get state(): ConnectionState {
    if (this.closeRequested && this._state !== 'disconnected') {
      return 'closing'
    }
    return this._state
  }

  get connected(): boolean {
    return this.state === 'connected'
  }

  /** Failed attempts since the last successful connection. */
  get tries(): number {
    return this._tries
  }

  get lastDisconnectReason(): DisconnectReason | null {
    return this._lastDisconnectReason
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  registerOnConnect(callback: LifecycleCallback): void {
    this.onConnectCallbacks.push(callback)
  }

  registerOnDisconnect(callback: LifecycleCallback): void {
    this.onDisconnectCallbacks.push(callback)
  }

  /**
   * Runs the connection loop. Resolves when the loop stops for good, either
   * because `disconnect()` was called or because of a permanent failure.
   *
   * @throws {IllegalStateError} If the manager is not disconnected
   */
  async connect(): Promise<void> {
    if (this._state !== 'disconnected') {
      throw new IllegalStateError('Connect called while not disconnected')
    }

    const stopped = resolver<void>()
    this.stopped = stopped
    this.closeRequested = false
    this._tries = 0
    this.setState('connecting')

    try {
      for (;;) {
        try {
          this.logger.debug('Trying to connect', { url: this.serverUrl })
          await this.handleConnection()
        } catch (error) {
          // Safety net so the loop always gets to reconnect
          this.logger.error('Unexpected error', errorData(error))
        }

        if (this._state === 'connected') {
          this.setState('connecting')
          this.emit('disconnect', this._lastDisconnectReason)
          await gatherCallbacks(this.logger, 'on_disconnect', this.onDisconnectCallbacks)
        }

        if (this.closeRequested) break
        if (this.requireSubscription && this.cloud.subscriptionExpired) break

        this.setState('connecting')
        this._tries++

        const delay = retryDelay(this._tries, this.random, this.config.maxRetryExponent)
        this.logger.debug('Waiting before reconnecting', { tries: this._tries, delaySeconds: delay })
        const elapsed = await this.retryTimer.wait(delay * 1000)
        if (!elapsed || this.closeRequested) break
      }
    } finally {
      this.setState('disconnected')
      this.stopped = null
      stopped.resolve()
    }
  }

  /**
   * Stops the loop and waits until it has reached `disconnected`.
   *
   * Closes the open connection, aborts a handshake in progress, or cuts the
   * backoff sleep short.
   */
  async disconnect(): Promise<void> {
    const stopped = this.stopped
    if (!stopped) return

    this.closeRequested = true
    this.emitState()
    this.handshakeAbort?.abort()

    const connection = this.connection
    if (connection) {
      await this.closeConnection(connection)
    } else {
      this.retryTimer.cancel()
    }

    await stopped.promise
  }

  /**
   * Writes one message to the open connection.
   *
   * @throws {NotConnectedError} Unless the state is `connected`
   */
  async sendJson(message: JsonValue): Promise<void> {
    const connection = this.connection
    if (this.state !== 'connected' || !connection) {
      throw new NotConnectedError()
    }
    if (this.logger.debugEnabled) {
      this.logger.debug('Publishing message', { message })
    }
    await connection.sendJson(message)
  }

  // ---------------------------------------------------------------------------
  // Helpers for senders
  // ---------------------------------------------------------------------------

  /**
   * Starts the connection loop in the background if it is not running, then
   * yields once so the loop can begin. Concurrent callers start it only once.
   */
  protected async startIfDisconnected(): Promise<void> {
    await this.connectLock.withLock(async () => {
      if (this._state !== 'disconnected') return
      this.connect().catch((error: unknown) => {
        this.logger.error('Connection loop failed', errorData(error))
      })
      await Promise.resolve()
    })
  }

  /**
   * Resolves once the manager is connected.
   *
   * @throws {NotConnectedError} If the loop stops before connecting
   * @throws {RequestAbortedError} If `signal` aborts first
   */
  protected waitForConnected(signal?: AbortSignal): Promise<void> {
    if (this.connected) return Promise.resolve()
    if (this.state === 'disconnected') return Promise.reject(new NotConnectedError())
    if (signal?.aborted) return Promise.reject(new RequestAbortedError(undefined, { cause: signal.reason }))

    if (!this.connectWaiter) this.connectWaiter = resolver<void>()
    const connected = this.connectWaiter.promise
    if (!signal) return connected

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        reject(new RequestAbortedError(undefined, { cause: signal.reason }))
      }
      signal.addEventListener('abort', onAbort, { once: true })
      void connected.then(
        () => {
          signal.removeEventListener('abort', onAbort)
          resolve()
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort)
          reject(error)
        }
      )
    })
  }

  // ---------------------------------------------------------------------------
  // Connection attempt
  // ---------------------------------------------------------------------------

  private async handleConnection(): Promise<void> {
    try {
      await this.cloud.auth.ensureValidToken()
    } catch (error) {
      if (error instanceof UnauthenticatedError) {
        this.logger.error('Unable to refresh token', errorData(error))
        this.notifyUser(MESSAGE_AUTH_FAIL)
        this.closeRequested = true
        this.logoutInBackground()
      } else {
        this.logger.warn('Cannot connect because unable to refresh token', errorData(error))
      }
      return
    }

    if (this.closeRequested) return

    if (this.requireSubscription && this.cloud.subscriptionExpired) {
      this.logger.debug('Cloud subscription expired. Cancelling connecting.')
      this.notifyUser(MESSAGE_EXPIRATION)
      this.closeRequested = true
      return
    }

    let clean = false
    let reason: string | null = null
    const abort = new AbortController()
    this.handshakeAbort = abort

    try {
      const connection = await this.connectionFactory(
        this.serverUrl,
        { Authorization: `Bearer ${this.cloud.idToken ?? ''}` },
        abort.signal
      )
      this.handshakeAbort = null
      this.connection = connection

      if (this.closeRequested) {
        reason = 'Disconnect requested during handshake'
        return
      }

      if (!this.config.markConnectedAfterFirstMessage) {
        await this.markConnected()
      }

      while (!connection.closed) {
        let frame: Frame
        try {
          frame = await connection.receive(this.config.idleTimeoutMs)
        } catch (error) {
          if (error instanceof ReceiveTimeoutError) {
            await connection.ping()
            continue
          }
          throw error
        }

        if (frame.type === 'close') {
          clean = this._state === 'connected'
          reason = this.closeRequested
            ? 'Disconnect requested'
            : `Closed by server: ${frame.extra ?? ''} (${String(frame.data)})`
          break
        }

        // A second client on the same credentials can pass the handshake and
        // still be dropped, so only a non-close frame confirms the session.
        if (this._state !== 'connected' && !this.closeRequested) {
          await this.markConnected()
        }

        if (frame.type === 'error') {
          reason = 'Connection error'
          break
        }

        if (frame.type !== 'text') {
          reason = `Received non-Text message: ${frame.type}`
          break
        }

        let message: JsonValue
        try {
          message = frame.json()
        } catch (error) {
          reason = 'Received invalid JSON.'
          this.logger.debug('Invalid JSON frame', { data: frame.data, ...errorData(error) })
          break
        }

        if (this.logger.debugEnabled) {
          this.logger.debug('Received message', { message })
        }

        try {
          this.handleMessage(message)
        } catch (error) {
          this.logger.error('Unexpected error handling message', { message, ...errorData(error) })
        }
      }

      if (connection.closed && reason === null) {
        clean = true
        reason = 'Closed by server: unknown'
      }
    } catch (error) {
      if (error instanceof HandshakeError && error.status === 401) {
        reason = 'Invalid auth.'
        this.closeRequested = true
        this.notifyUser(MESSAGE_AUTH_FAIL)
      } else if (error instanceof HandshakeError || error instanceof ConnectionError) {
        reason = error.message
        if (!this.closeRequested) {
          this.logger.warn('Unable to connect', errorData(error))
        }
      } else {
        throw error
      }
    } finally {
      this.handshakeAbort = null
      const connection = this.connection
      this.connection = null
      if (connection) {
        await this.closeConnection(connection)
      }
      this._lastDisconnectReason = { clean, reason: reason ?? 'unknown' }
      if (clean) {
        this.logger.info(`Connection closed: ${this._lastDisconnectReason.reason}`)
      } else {
        this.logger.warn(`Connection closed: ${this._lastDisconnectReason.reason}`)
      }
    }
  }

  private async markConnected(): Promise<void> {
    this._lastDisconnectReason = null
    this._tries = 0
    this.setState('connected')
    this.logger.info('Connected')
    this.emit('connect')

    if (this.onConnectCallbacks.length > 0) {
      await gatherCallbacks(this.logger, 'on_connect', this.onConnectCallbacks)
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private setState(state: LoopState): void {
    if (this._state === state) return
    this._state = state
    this.settleConnectWaiter(state)
    this.emitState()
  }

  private settleConnectWaiter(state: LoopState): void {
    const waiter = this.connectWaiter
    if (!waiter) return
    if (state === 'connected') {
      this.connectWaiter = null
      waiter.resolve()
    } else if (state === 'disconnected') {
      this.connectWaiter = null
      waiter.reject(new NotConnectedError('Connection stopped before it was established'))
    }
  }

  /** Emits `stateChange` when the observable state differs from the last one emitted. */
  private emitState(): void {
    const state = this.state
    if (state !== this.emittedState) {
      this.emittedState = state
      this.emit('stateChange', state)
    }
  }

  private async closeConnection(connection: Connection): Promise<void> {
    try {
      await connection.close()
    } catch (error) {
      this.logger.warn('Error closing connection', errorData(error))
    }
  }

  private notifyUser(message: string): void {
    try {
      this.cloud.client.userMessage(USER_MESSAGE_ID, USER_MESSAGE_TITLE, message)
    } catch (error) {
      this.logger.error('Unable to notify user', errorData(error))
    }
  }

  private logoutInBackground(): void {
    // Not awaited: logging out stops this manager.
    this.cloud.logout().catch((error: unknown) => {
      this.logger.error('Logout failed', errorData(error))
    })
  }
}
