/**
 * @file Cloud Relay Connection Tests
 *
 * Request/response correlation over the relay and dispatch of relay
 * initiated requests.
 */

import { once } from 'events'
import { resolver } from '@rocicorp/resolver'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  ConnectionClosedError,
  ErrorResponse,
  NotConnectedError,
  ReplyTimeoutError,
  RequestAbortedError,
} from '../../src/errors.js'
import { CloudIoT, type CloudIoTOptions } from '../../src/iot/cloud-iot.js'
import { createDefaultHandlers } from '../../src/iot/builtin-handlers.js'
import { HandlerRegistry } from '../../src/iot/handlers.js'
import { bindLogger } from '../../src/logger.js'
import type { CloudContext, JsonValue } from '../../src/types.js'
import { createMockCloud, createRecordingLogger, type MockCloud, type RecordingLogger } from '../helpers/mock-cloud.js'
import { MockConnection, MockConnectionFactory, isObject } from '../helpers/mock-connection.js'

describe('CloudIoT', () => {
  let cloud: MockCloud
  let logger: RecordingLogger
  let factory: MockConnectionFactory
  let connection: MockConnection

  const createIoT = (options: CloudIoTOptions = {}) =>
    new CloudIoT(cloud, {
      connectionFactory: factory.factory,
      logger,
      random: () => 0,
      ...options,
    })

  /** Answers every request whose handler is `kind` with `payload`. */
  const answer = (kind: string, payload: JsonValue) => {
    connection.onSend = (message) => {
      if (isObject(message) && message.handler === kind && typeof message.msgid === 'string') {
        connection.pushJson({ msgid: message.msgid, payload })
      }
    }
  }

  async function start(iot: CloudIoT): Promise<Promise<void>> {
    const connected = once(iot, 'connect')
    const running = iot.connect()
    await connected
    return running
  }

  beforeEach(() => {
    vi.useFakeTimers()
    cloud = createMockCloud()
    logger = createRecordingLogger()
    factory = new MockConnectionFactory()
    connection = new MockConnection()
    factory.next(connection)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should connect to the relayer websocket endpoint', async () => {
    const iot = createIoT()
    const running = await start(iot)

    expect(iot.serverUrl).toBe('wss://relay.test/websocket')
    expect(factory.calls[0]?.url).toBe('wss://relay.test/websocket')

    await iot.disconnect()
    await running
  })

  describe('sendRequest', () => {
    it('should send the envelope and resolve with the reply payload', async () => {
      const iot = createIoT()
      const running = await start(iot)
      answer('webhook', { response: true })

      const reply = await iot.sendRequest('webhook', { hello: 'world' })

      expect(reply).toEqual({ response: true })
      const [request] = connection.requests()
      expect(request).toMatchObject({ handler: 'webhook', payload: { hello: 'world' } })
      expect(request?.msgid).toMatch(/^[0-9a-f]{32}$/)
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should match replies that arrive in reverse order', async () => {
      const iot = createIoT()
      const running = await start(iot)

      const first = iot.sendRequest('sync', 1)
      const second = iot.sendRequest('sync', 2)
      await vi.advanceTimersByTimeAsync(0)
      expect(iot.pendingCount).toBe(2)

      const [a, b] = connection.requests()
      connection.pushJson({ msgid: b?.msgid ?? '', payload: 'second' })
      connection.pushJson({ msgid: a?.msgid ?? '', payload: 'first' })

      expect(await first).toBe('first')
      expect(await second).toBe('second')
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should give every request a distinct id', async () => {
      const iot = createIoT()
      const running = await start(iot)
      answer('ping', 'pong')

      await Promise.all([iot.sendRequest('ping', null), iot.sendRequest('ping', null), iot.sendRequest('ping', null)])

      const ids = connection.requests().map((request) => request.msgid)
      expect(new Set(ids).size).toBe(3)

      await iot.disconnect()
      await running
    })

    it('should reject with ErrorResponse for an error reply', async () => {
      const iot = createIoT()
      const running = await start(iot)
      connection.onSend = (message) => {
        if (isObject(message) && typeof message.msgid === 'string') {
          connection.pushJson({ msgid: message.msgid, error: 'not-found', message: 'No such webhook' })
        }
      }

      const error = await iot.sendRequest('webhook', {}).catch((reason: unknown) => reason)

      expect(error).toBeInstanceOf(ErrorResponse)
      expect(error).toMatchObject({ code: 'not-found', message: 'No such webhook' })
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should reject with ReplyTimeoutError when the peer timed out', async () => {
      const iot = createIoT()
      const running = await start(iot)
      connection.onSend = (message) => {
        if (isObject(message) && typeof message.msgid === 'string') {
          connection.pushJson({ msgid: message.msgid, error: 'timeout' })
        }
      }

      await expect(iot.sendRequest('alexa', {})).rejects.toBeInstanceOf(ReplyTimeoutError)

      await iot.disconnect()
      await running
    })

    it('should resolve null without waiting when no reply is expected', async () => {
      const iot = createIoT()
      const running = await start(iot)

      expect(await iot.sendRequest('system', { event: 'ready' }, { expectReply: false })).toBeNull()
      expect(connection.requests()).toHaveLength(1)
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should wait for an unanswered request until the caller aborts', async () => {
      const iot = createIoT()
      const running = await start(iot)
      const abort = new AbortController()

      let outcome = 'pending'
      const request = iot.sendRequest('ping', {}, { signal: abort.signal })
      const settled = request.then(
        () => {
          outcome = 'resolved'
        },
        (reason: unknown) => {
          outcome = 'rejected'
          return reason
        }
      )
      await vi.advanceTimersByTimeAsync(10 * 60_000)
      expect(outcome).toBe('pending')
      expect(iot.pendingCount).toBe(1)

      abort.abort()

      expect(await settled).toBeInstanceOf(RequestAbortedError)
      expect(iot.pendingCount).toBe(0)

      // A late reply is dropped
      const [sent] = connection.requests()
      connection.pushJson({ msgid: sent?.msgid ?? '', payload: 'late' })
      await vi.advanceTimersByTimeAsync(0)
      expect(logger.messages('warn')).toContain('Received reply for unknown request')

      await iot.disconnect()
      await running
    })

    it('should fail requests on the wire when the connection drops', async () => {
      const iot = createIoT()
      const running = await start(iot)

      const settled = iot.sendRequest('sync', null).catch((reason: unknown) => reason)
      await vi.advanceTimersByTimeAsync(0)

      connection.pushClose(1000, 'bye')

      expect(await settled).toBeInstanceOf(ConnectionClosedError)
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should reject when the write fails', async () => {
      const iot = createIoT()
      const running = await start(iot)
      connection.sendError = new Error('socket gone')

      await expect(iot.sendRequest('sync', null)).rejects.toThrow('socket gone')
      expect(iot.pendingCount).toBe(0)

      await iot.disconnect()
      await running
    })

    it('should start the connection on first use', async () => {
      const iot = createIoT()
      answer('webhook', 'done')

      const first = iot.sendRequest('webhook', 1)
      const second = iot.sendRequest('webhook', 2)

      expect(await first).toBe('done')
      expect(await second).toBe('done')
      expect(factory.calls).toHaveLength(1)
      expect(iot.connected).toBe(true)

      await iot.disconnect()
    })

    it('should let a burst of callers wait for one connection without a listener each', async () => {
      const gate = resolver<void>()
      cloud.auth.ensureValidToken.mockImplementationOnce(() => gate.promise)
      const iot = createIoT()
      answer('webhook', 'done')

      const requests = Array.from({ length: 12 }, (_, index) => iot.sendRequest('webhook', index))
      await vi.advanceTimersByTimeAsync(0)

      expect(iot.state).toBe('connecting')
      expect(iot.listenerCount('stateChange')).toBe(0)

      gate.resolve()

      expect(await Promise.all(requests)).toEqual(Array.from({ length: 12 }, () => 'done'))
      expect(factory.calls).toHaveLength(1)

      await iot.disconnect()
    })

    it('should fail every waiting caller when the attempt stops', async () => {
      const gate = resolver<void>()
      cloud.auth.ensureValidToken.mockImplementationOnce(() => gate.promise)
      const iot = createIoT()

      const first = iot.sendRequest('webhook', 1).catch((reason: unknown) => reason)
      const second = iot.sendRequest('webhook', 2).catch((reason: unknown) => reason)
      await vi.advanceTimersByTimeAsync(0)

      const stopped = iot.disconnect()
      gate.resolve()
      await stopped

      expect(await first).toBeInstanceOf(NotConnectedError)
      expect(await second).toBeInstanceOf(NotConnectedError)
      expect(factory.calls).toHaveLength(0)
    })

    it('should fail when the connection cannot be established', async () => {
      cloud.subscriptionExpired = true
      const iot = createIoT()

      await expect(iot.sendRequest('webhook', 1)).rejects.toBeInstanceOf(NotConnectedError)
      expect(factory.calls).toHaveLength(0)
      expect(iot.state).toBe('disconnected')
    })

    it('should stop waiting for the connection when aborted', async () => {
      factory = new MockConnectionFactory()
      factory.next('hang')
      const iot = createIoT()
      const abort = new AbortController()

      const settled = iot.sendRequest('webhook', 1, { signal: abort.signal }).catch((reason: unknown) => reason)
      await vi.advanceTimersByTimeAsync(0)
      abort.abort()

      expect(await settled).toBeInstanceOf(RequestAbortedError)

      await iot.disconnect()
    })
  })

  describe('inbound requests', () => {
    it('should answer with the handler result', async () => {
      const handlers = new HandlerRegistry<CloudContext>()
      const handler = vi.fn(async (_cloud: CloudContext, _payload: JsonValue): Promise<JsonValue> => 'response')
      handlers.register('test-handler', handler)
      const iot = createIoT({ handlers })
      const running = await start(iot)

      connection.pushJson({ msgid: 'test-msg-id', handler: 'test-handler', payload: 'test-payload' })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(handler).toHaveBeenCalledWith(cloud, 'test-payload')
      expect(connection.sent).toEqual([{ msgid: 'test-msg-id', payload: 'response' }])

      await iot.disconnect()
      await running
    })

    it('should use the built-in handlers by default', async () => {
      const iot = createIoT()
      const running = await start(iot)

      connection.pushJson({ msgid: 'hook-1', handler: 'webhook', payload: { body: 'x' } })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(cloud.client.webhookMessage).toHaveBeenCalledWith({ body: 'x' })
      expect(connection.sent).toEqual([{ msgid: 'hook-1', payload: { webhook: { body: 'x' } } }])

      await iot.disconnect()
      await running
    })

    it('should accept handlers registered after construction', async () => {
      const iot = createIoT({ handlers: new HandlerRegistry<CloudContext>() })
      iot.registerHandler('late', async () => ({ late: true }))
      const running = await start(iot)

      connection.pushJson({ msgid: 'm1', handler: 'late' })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(connection.sent).toEqual([{ msgid: 'm1', payload: { late: true } }])

      await iot.disconnect()
      await running
    })

    it('should answer unknown-handler once the cloud handler is unregistered', async () => {
      const handlers = createDefaultHandlers(bindLogger(logger))
      handlers.unregister('cloud')
      const iot = createIoT({ handlers })
      const running = await start(iot)

      connection.pushJson({ msgid: 'x', handler: 'cloud', payload: { action: 'logout' } })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(connection.sent).toEqual([{ msgid: 'x', error: 'unknown-handler' }])
      expect(cloud.logout).not.toHaveBeenCalled()

      await iot.disconnect()
      await running
    })

    it('should answer unknown-handler for an unknown kind', async () => {
      const iot = createIoT({ handlers: new HandlerRegistry<CloudContext>() })
      const running = await start(iot)

      connection.pushJson({ msgid: 'test-msg-id', handler: 'non-existing-test-handler', payload: 'test-payload' })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(connection.sent).toEqual([{ msgid: 'test-msg-id', error: 'unknown-handler' }])

      await iot.disconnect()
      await running
    })

    it('should answer exception when the handler throws and keep the connection', async () => {
      const handlers = new HandlerRegistry<CloudContext>().register('test-handler', async () => {
        throw new Error('Broken')
      })
      const iot = createIoT({ handlers })
      const running = await start(iot)

      connection.pushJson({ msgid: 'test-msg-id', handler: 'test-handler', payload: 'test-payload' })
      await vi.advanceTimersByTimeAsync(0)
      await iot.idle()

      expect(connection.sent).toEqual([{ msgid: 'test-msg-id', error: 'exception' }])
      expect(iot.connected).toBe(true)

      await iot.disconnect()
      await running
    })

    it('should not block the receive loop on a slow handler', async () => {
      const gate = resolver<void>()
      const handlers = new HandlerRegistry<CloudContext>()
        .register('slow', async () => {
          await gate.promise
          return 'slow'
        })
        .register('fast', async () => 'fast')
      const iot = createIoT({ handlers })
      const running = await start(iot)

      connection.pushJson({ msgid: 's', handler: 'slow' })
      connection.pushJson({ msgid: 'f', handler: 'fast' })
      await vi.advanceTimersByTimeAsync(0)

      expect(connection.sent).toEqual([{ msgid: 'f', payload: 'fast' }])

      gate.resolve()
      await iot.idle()

      expect(connection.sent).toEqual([
        { msgid: 'f', payload: 'fast' },
        { msgid: 's', payload: 'slow' },
      ])

      await iot.disconnect()
      await running
    })

    it('should log a reply that can no longer be sent', async () => {
      const gate = resolver<void>()
      const handlers = new HandlerRegistry<CloudContext>().register('slow', async () => {
        await gate.promise
        return 'too late'
      })
      const iot = createIoT({ handlers })
      const running = await start(iot)

      connection.pushJson({ msgid: 's', handler: 'slow' })
      await vi.advanceTimersByTimeAsync(0)
      await iot.disconnect()
      await running

      gate.resolve()
      await iot.idle()

      expect(connection.sent).toEqual([])
      expect(logger.messages('warn')).toContain('Connection closed before the reply could be sent')
    })

    it('should drop messages without a valid envelope', async () => {
      const iot = createIoT()
      const running = await start(iot)

      connection.pushJson({ handler: 'webhook' })
      await vi.advanceTimersByTimeAsync(0)

      expect(logger.messages('warn')).toEqual(['Received message without a valid envelope'])
      expect(connection.sent).toEqual([])
      expect(iot.connected).toBe(true)

      await iot.disconnect()
      await running
    })
  })
})
