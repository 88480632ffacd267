/**
 * @file Wire Envelope
 *
 * Schema of the JSON objects exchanged with the relay, and the correlation
 * id generator.
 *
 * ```
 * client request : { msgid, handler, payload }
 * peer request   : { msgid, handler, payload? }
 * reply          : { msgid, payload } | { msgid, error, message? }
 * ```
 */

import { randomBytes } from 'node:crypto'
import { z } from 'zod'
import type { JsonValue } from '../types.js'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

export const envelopeSchema = z.object({
  msgid: z.string().min(1),
  handler: z.string().optional(),
  payload: jsonValueSchema.optional(),
  error: z.string().optional(),
  message: z.string().optional(),
})

/** An inbound message after validation. */
export type Envelope = z.infer<typeof envelopeSchema>

export type RequestEnvelope = {
  msgid: string
  handler: string
  payload: JsonValue
}

export type ReplyEnvelope = { msgid: string; payload: JsonValue } | { msgid: string; error: string }

/**
 * Validates an inbound JSON value.
 *
 * @returns The envelope, or `null` if it does not have the envelope shape
 */
export function parseEnvelope(value: JsonValue): Envelope | null {
  const result = envelopeSchema.safeParse(value)
  return result.success ? result.data : null
}

/**
 * 128-bit random correlation id, hex encoded.
 */
export function newMsgid(): string {
  return randomBytes(16).toString('hex')
}
