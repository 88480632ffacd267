import { consoleLogSink, LogContext } from '@rocicorp/logger'
import type { LogLevel, RelayLogger } from './types.js'

/**
 * Logger with every level present, so call sites do not need optional
 * chaining.
 *
 * @internal
 */
export interface BoundLogger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  readonly debugEnabled: boolean
}

/**
 * Default logger: a `LogContext` writing to the console, tagged with the
 * component name.
 */
export function createDefaultLogger(component: string, level: LogLevel = 'info'): RelayLogger {
  return new LogContext(level, { component }, consoleLogSink)
}

/**
 * Normalizes a user supplied logger. Missing methods become no-ops.
 *
 * @internal
 */
export function bindLogger(logger: RelayLogger): BoundLogger {
  const noop = () => {}
  return {
    debug: logger.debug?.bind(logger) ?? noop,
    info: logger.info?.bind(logger) ?? noop,
    warn: logger.warn?.bind(logger) ?? noop,
    error: logger.error?.bind(logger) ?? noop,
    debugEnabled: logger.debug !== undefined,
  }
}

/**
 * Serializes an error for structured log data.
 *
 * @internal
 */
export function errorData(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, name: error.name, stack: error.stack }
  }
  return { error: String(error) }
}
