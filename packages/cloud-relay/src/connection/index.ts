/**
 * @file Connection Module Exports
 */

export { WebSocketConnection, openWebSocket } from './ws-connection.js'
export { binaryFrame, closeFrame, errorFrame, textFrame } from './frames.js'
export type { Connection, ConnectionFactory, Frame, FrameType } from './types.js'
