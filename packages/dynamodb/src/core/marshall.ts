import type { AttributeMap, AttributeValue } from "../ports/attribute-value"
import type { JsonObject, JsonValue } from "../ports/json-value"
import { formatNumber } from "./numbers/format-number"

/**
 * Encode a generic value as an attribute value. Total: every input has an
 * encoding.
 *
 * Only `NULL`, `BOOL`, `N`, `S`, `L` and `M` are produced. Non-finite numbers
 * become `NULL`, as they do in JSON text.
 */
export function toStoreValue(value: JsonValue): AttributeValue {
  if (value === null) return { NULL: true }

  if (typeof value === "boolean") return { BOOL: value }

  if (typeof value === "number") {
    return Number.isFinite(value) ? { N: formatNumber(value) } : { NULL: true }
  }

  if (typeof value === "bigint") return { N: formatNumber(value) }

  if (typeof value === "string") return { S: value }

  // Array.from reads holes as undefined, which encode as NULL
  if (Array.isArray(value)) {
    return { L: Array.from(value, (item) => toStoreValue(item ?? null)) }
  }

  return { M: toStoreItem(value) }
}

/**
 * Encode each top-level property of an object, producing an item.
 */
export function toStoreItem(value: JsonObject): AttributeMap {
  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, toStoreValue(item)]),
  )
}
