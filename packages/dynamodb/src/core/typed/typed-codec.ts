import type { AttributeMap, AttributeValue } from "../../ports/attribute-value"
import type { JsonObject, JsonValue } from "../../ports/json-value"
import type { Serializer } from "../../ports/serializer"
import { DeserializationError, describeCause, SerializationError } from "../errors"
import { toStoreItem, toStoreValue } from "../marshall"
import { fromStoreItem, fromStoreValue, type UnmarshallOptions } from "../unmarshall"

export function encodeTyped<T>(value: T, serializer: Serializer<T>): AttributeValue {
  return toStoreValue(serialize(value, serializer, "encodeTyped"))
}

export function decodeTyped<T>(
  attr: AttributeValue,
  serializer: Serializer<T>,
  options: UnmarshallOptions = {},
): T {
  return deserialize(fromStoreValue(attr, options), serializer, "decodeTyped")
}

/**
 * Like {@link encodeTyped}, for values whose generic form is an object, which
 * becomes a whole item rather than an `M` attribute.
 *
 * @throws SerializationError when the generic form is not an object.
 */
export function encodeTypedItem<T>(value: T, serializer: Serializer<T>): AttributeMap {
  const generic = serialize(value, serializer, "encodeTypedItem")

  if (!isJsonObject(generic)) {
    throw new SerializationError("Only values that serialize to an object can be stored as an item", {
      context: { operation: "encodeTypedItem", kind: kindOf(generic) },
    })
  }

  return toStoreItem(generic)
}

export function decodeTypedItem<T>(
  item: AttributeMap,
  serializer: Serializer<T>,
  options: UnmarshallOptions = {},
): T {
  return deserialize(fromStoreItem(item, options), serializer, "decodeTypedItem")
}

function serialize<T>(value: T, serializer: Serializer<T>, operation: string): JsonValue {
  try {
    return serializer.toGenericValue(value)
  } catch (err) {
    throw new SerializationError(`Failed to serialize value: ${describeCause(err)}`, {
      context: { operation },
      cause: err,
    })
  }
}

function deserialize<T>(generic: JsonValue, serializer: Serializer<T>, operation: string): T {
  try {
    return serializer.fromGenericValue(generic)
  } catch (err) {
    throw new DeserializationError(`Decoded value does not match the expected shape: ${describeCause(err)}`, {
      context: { operation, kind: kindOf(generic) },
      cause: err,
    })
  }
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function kindOf(value: JsonValue): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}
