/**
 * Response envelope types for taskwire
 *
 * Every server response is wrapped in `{ "ok": bool, ... }`. On success the
 * payload sits under exactly one of a few keys, chosen per endpoint; on
 * failure `error` carries the message.
 */

import type { JsonValue } from "./json.js"

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Payload keys in priority order. The first key present in a successful
 * envelope holds the payload; when none is present the whole document is the
 * payload. Every endpoint relies on this exact order.
 */
export const ENVELOPE_PAYLOAD_KEYS = ["data", "status", "agents", "analytics"] as const

/** Message used when a failed envelope carries no `error`. */
export const UNKNOWN_ERROR_MESSAGE = "Unknown error"

// =============================================================================
// TYPES
// =============================================================================

export type EnvelopePayloadKey = (typeof ENVELOPE_PAYLOAD_KEYS)[number]

/** Where a decoded payload was taken from. */
export type PayloadSource = EnvelopePayloadKey | "root"

/** Wire shape of a response envelope. */
export interface Envelope<T = JsonValue> {
  readonly ok: boolean
  readonly data?: T
  readonly status?: T
  readonly agents?: T
  readonly analytics?: T
  readonly error?: string
}

/** Result of decoding a response body. */
export type DecodedEnvelope =
  | {
      readonly ok: true
      readonly payload: JsonValue
      readonly source: PayloadSource
      readonly document: JsonValue
    }
  | {
      readonly ok: false
      readonly error: string
      /** Parsed document when the body was JSON, otherwise the raw text. */
      readonly document: JsonValue
    }
