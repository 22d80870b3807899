import type { AttributeMap, AttributeValue } from "../ports/attribute-value"
import type { NumberFallback } from "../ports/codec-options"
import type { JsonObject, JsonValue } from "../ports/json-value"
import { type InvalidNumberReason, parseNumber } from "./numbers/parse-number"

export type NumberFallbackEvent = {
  text: string
  reason: InvalidNumberReason
  numberFallback: NumberFallback
}

export type UnmarshallOptions = {
  /** @default "lenient" */
  numberFallback?: NumberFallback

  /**
   * Called once per `N` text that took the fallback. Observational only.
   */
  onNumberFallback?: (event: NumberFallbackEvent) => void
}

/**
 * Decode an attribute value into a generic value. Never throws.
 *
 * Sets decode to arrays in their stored order, binary to an array of byte
 * numbers. `NULL` and variants unknown to this code decode to `null`.
 */
export function fromStoreValue(attr: AttributeValue, options: UnmarshallOptions = {}): JsonValue {
  if (attr.S !== undefined) return attr.S

  if (attr.B !== undefined) return bytesToArray(attr.B)

  if (attr.BOOL !== undefined) return attr.BOOL

  if (attr.M !== undefined) return fromStoreItem(attr.M, options)

  if (attr.L !== undefined) return attr.L.map((item) => fromStoreValue(item, options))

  if (attr.NS !== undefined) return attr.NS.map((text) => decodeNumber(text, options))

  if (attr.BS !== undefined) return attr.BS.map((bytes) => bytesToArray(bytes))

  if (attr.SS !== undefined) return [...attr.SS]

  if (attr.N !== undefined) return decodeNumber(attr.N, options)

  return decodeNullOrUnknown(attr)
}

/**
 * Decode every attribute of an item.
 */
export function fromStoreItem(item: AttributeMap, options: UnmarshallOptions = {}): JsonObject {
  return Object.fromEntries(
    Object.entries(item).map(([key, attr]) => [key, fromStoreValue(attr, options)]),
  )
}

// A variant added to AttributeValue fails to compile here until handled above.
function decodeNullOrUnknown(
  _attr: AttributeValue.NULLMember | AttributeValue.$UnknownMember,
): null {
  return null
}

function decodeNumber(text: string, options: UnmarshallOptions): JsonValue {
  const parsed = parseNumber(text)

  if (parsed.kind === "number") return parsed.value

  const numberFallback = options.numberFallback ?? "lenient"
  options.onNumberFallback?.({ text, reason: parsed.reason, numberFallback })

  return numberFallback === "lenient" ? text : null
}

function bytesToArray(bytes: Uint8Array): number[] {
  return Array.from(bytes)
}
