/**
 * @taskwire/sdk Webhook signatures
 *
 * The server signs each delivery with HMAC-SHA256 over the canonical JSON
 * form of its body (keys sorted, `", "` and `": "` separators, non-ASCII
 * escaped as \uXXXX) and sends the hex digest in X-Webhook-Signature.
 *
 * @example
 * ```typescript
 * app.post('/hooks/tasks', (req, res) => {
 *   const signature = req.header(WEBHOOK_SIGNATURE_HEADER)
 *   if (!verifyWebhookSignature(req.rawBody, signature, 'test-secret')) {
 *     return res.status(401).end()
 *   }
 *   const delivery = parseWebhookDelivery(req.rawBody)
 * })
 * ```
 */

import { createHmac, timingSafeEqual } from "node:crypto"
import { Effect, Option, Schema } from "effect"
import { isLosslessNumber, parse as parseLossless } from "lossless-json"
import { WebhookDeliverySchema } from "@taskwire/types"
import { MCPError, runSync } from "@taskwire/core"
import type { JsonValue, WebhookDelivery } from "./types.js"

const SIGNATURE_PREFIX = "sha256="

const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const escapeChar = (char: string): string =>
  SHORT_ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`

// Everything outside printable ASCII is escaped, per UTF-16 code unit.
const quote = (value: string): string => `"${value.replace(/["\\]|[^ -~]/g, escapeChar)}"`

// Numbers parsed from a delivery keep their source text (`1.0`, `5e-05`).
const writeCanonical = (value: unknown): string => {
  if (value === null || value === undefined) return "null"
  if (typeof value === "string") return quote(value)
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  if (isLosslessNumber(value)) return value.value
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => writeCanonical(item)).join(", ")}]`
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]: [string, unknown]) => `${quote(key)}: ${writeCanonical(item)}`)
    return `{${entries.join(", ")}}`
  }
  return "null"
}

/**
 * Serialize a JSON value in the canonical form used for signing.
 */
export const canonicalJson = (value: JsonValue): string => writeCanonical(value)

const hmacHex = (content: string, secret: string): string =>
  createHmac("sha256", secret).update(content, "utf8").digest("hex")

/**
 * Compute the signature header value for a payload.
 */
export const signWebhookPayload = (payload: JsonValue, secret: string): string =>
  hmacHex(canonicalJson(payload), secret)

const sameDigest = (expected: string, actual: string): boolean => {
  const a = Buffer.from(expected, "utf8")
  const b = Buffer.from(actual, "utf8")
  return a.length === b.length && timingSafeEqual(a, b)
}

const parseDeliveryText = Option.liftThrowable((text: string): unknown => parseLossless(text))

/**
 * Check a delivery's signature against the raw request body.
 *
 * Accepts a digest computed over the canonical form of the body or over the
 * body bytes as received. The canonical form is rebuilt from the body text,
 * so numbers are signed exactly as the server wrote them. A `sha256=` prefix
 * on the header is ignored.
 */
export const verifyWebhookSignature = (
  rawBody: string,
  signature: string | null | undefined,
  secret: string
): boolean => {
  if (!signature) return false
  const digest = signature.trim().toLowerCase().replace(SIGNATURE_PREFIX, "")

  const candidates = [hmacHex(rawBody, secret)]
  const parsed = parseDeliveryText(rawBody)
  if (Option.isSome(parsed)) {
    candidates.push(hmacHex(writeCanonical(parsed.value), secret))
  }
  return candidates.some((candidate) => sameDigest(candidate, digest))
}

/**
 * Parse a delivery body.
 *
 * @throws {MCPError} 400 when the body is not a delivery
 */
export const parseWebhookDelivery = (rawBody: string): WebhookDelivery =>
  runSync(
    Schema.decodeUnknown(Schema.parseJson(WebhookDeliverySchema))(rawBody).pipe(
      Effect.mapError(
        (error) =>
          new MCPError({
            statusCode: 400,
            message: `Invalid webhook delivery: ${error.message}`,
            rawResponse: rawBody
          })
      )
    )
  )
