/**
 * @file Connection Manager Configuration
 *
 * Validates user supplied options and merges them over the defaults.
 *
 * @example
 * ```typescript
 * const config = resolveIoTConfig({ idleTimeoutMs: 30_000 })
 * config.maxPending // 100
 * ```
 */

import { z } from 'zod'
import { ConfigError } from './errors.js'

// =============================================================================
// Schema
// =============================================================================

export const iotConfigSchema = z
  .object({
    /** Idle window before the manager pings the server */
    idleTimeoutMs: z.number().int().positive().default(55_000),
    /** Caps the exponential part of the backoff at `2 ** maxRetryExponent` seconds */
    maxRetryExponent: z.number().int().min(0).max(16).default(9),
    /** Only enter `connected` once the server sent its first frame */
    markConnectedAfterFirstMessage: z.boolean().default(false),
    /** Refuse to connect while the subscription is expired */
    requireSubscription: z.boolean().default(true),
    /** Capacity of the report-state outbound queue */
    maxPending: z.number().int().positive().default(100),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict()

/** Options accepted from callers; every field is optional. */
export type IoTConfigInput = z.input<typeof iotConfigSchema>

/** Fully resolved configuration. */
export type IoTConfig = z.output<typeof iotConfigSchema>

/**
 * Default configuration values.
 */
export const DEFAULT_IOT_CONFIG: Readonly<IoTConfig> = Object.freeze(iotConfigSchema.parse({}))

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validates `input` and fills in defaults.
 *
 * @throws {ConfigError} If any option has the wrong type or is out of range
 */
export function resolveIoTConfig(input: IoTConfigInput = {}): IoTConfig {
  const result = iotConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}
