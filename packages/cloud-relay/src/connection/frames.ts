/**
 * @file Frame Builders
 *
 * Constructors for the frames a `Connection` hands to the receive loop.
 */

import type { JsonValue } from '../types.js'
import type { Frame } from './types.js'

export function textFrame(text: string): Frame {
  return {
    type: 'text',
    data: text,
    json: (): JsonValue => JSON.parse(text),
  }
}

export function binaryFrame(bytes: Uint8Array): Frame {
  return {
    type: 'binary',
    data: bytes,
    json: () => {
      throw new SyntaxError('Binary frame is not JSON')
    },
  }
}

export function closeFrame(code: number, reason: string): Frame {
  return {
    type: 'close',
    data: code,
    extra: reason,
    json: () => {
      throw new SyntaxError('Close frame is not JSON')
    },
  }
}

export function errorFrame(error: Error): Frame {
  return {
    type: 'error',
    data: error,
    json: () => {
      throw new SyntaxError('Error frame is not JSON')
    },
  }
}
