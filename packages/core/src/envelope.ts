/**
 * Envelope decoding.
 *
 * Turns a response body into either the selected payload or the failure
 * message the server (or a malformed body) implies.
 */

import {
  ENVELOPE_PAYLOAD_KEYS,
  UNKNOWN_ERROR_MESSAGE,
  isJsonObject,
  type DecodedEnvelope,
  type JsonObject,
  type JsonValue
} from "@taskwire/types"

export const MALFORMED_JSON_MESSAGE = "Malformed response: invalid JSON"
export const NOT_AN_OBJECT_MESSAGE = "Malformed response: expected a JSON object"
export const MISSING_OK_MESSAGE = "Malformed response: missing \"ok\" field"

const parseJson = (text: string): JsonValue => JSON.parse(text)

const hasKey = (document: JsonObject, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(document, key)

/**
 * The `error` field of a document, when it is a non-empty string.
 */
export const envelopeErrorField = (document: JsonValue): string | undefined => {
  if (!isJsonObject(document)) return undefined
  const error = document["error"]
  return typeof error === "string" && error.length > 0 ? error : undefined
}

const failureMessage = (document: JsonObject): string => {
  const error = document["error"]
  if (error === undefined || error === null || error === "") return UNKNOWN_ERROR_MESSAGE
  return typeof error === "string" ? error : JSON.stringify(error)
}

/**
 * Decode a response body.
 *
 * Only `ok: true` counts as success. The payload is the value of the first
 * key of ENVELOPE_PAYLOAD_KEYS present in the document (a present `null`
 * counts), or the whole document when none is.
 */
export const decodeEnvelope = (body: string): DecodedEnvelope => {
  let document: JsonValue
  try {
    document = parseJson(body)
  } catch {
    return { ok: false, error: MALFORMED_JSON_MESSAGE, document: body }
  }

  if (!isJsonObject(document)) {
    return { ok: false, error: NOT_AN_OBJECT_MESSAGE, document }
  }

  if (!hasKey(document, "ok")) {
    return { ok: false, error: envelopeErrorField(document) ?? MISSING_OK_MESSAGE, document }
  }

  if (document["ok"] !== true) {
    return { ok: false, error: failureMessage(document), document }
  }

  for (const key of ENVELOPE_PAYLOAD_KEYS) {
    if (hasKey(document, key)) {
      return { ok: true, payload: document[key] ?? null, source: key, document }
    }
  }

  return { ok: true, payload: document, source: "root", document }
}
