import { createNullLogger, type Logger } from "@attrmap/logger"
import type { AttributeMap, AttributeValue } from "../ports/attribute-value"
import type { AttributeCodecOptions } from "../ports/codec-options"
import type { JsonObject, JsonValue } from "../ports/json-value"
import type { Serializer } from "../ports/serializer"
import { toStoreItem, toStoreValue } from "./marshall"
import { decodeTyped, decodeTypedItem, encodeTyped, encodeTypedItem } from "./typed/typed-codec"
import { fromStoreItem, fromStoreValue, type UnmarshallOptions } from "./unmarshall"

export type AttributeCodecDeps = {
  logger?: Logger
}

/**
 * Converts between generic values and attribute values with a fixed number
 * fallback policy, logging every fallback at debug level.
 *
 * @example
 * ```ts
 * const codec = new AttributeCodec({ logger }, { numberFallback: "strict" })
 *
 * codec.fromStoreValue({ N: "12abc" }) // null
 * codec.encodeTypedItem(order, createZodSerializer(orderSchema))
 * ```
 */
export class AttributeCodec {
  private readonly logger: Logger
  private readonly opts: AttributeCodecOptions
  private readonly unmarshallOptions: UnmarshallOptions

  constructor(deps: AttributeCodecDeps = {}, opts: Partial<AttributeCodecOptions> = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "attribute-codec" })
    this.opts = { numberFallback: opts.numberFallback ?? "lenient" }
    this.unmarshallOptions = {
      numberFallback: this.opts.numberFallback,
      onNumberFallback: (event) => {
        this.logger.debug("number attribute is not a representable number", {
          operation: "fromStoreValue",
          ...event,
        })
      },
    }
  }

  get numberFallback(): AttributeCodecOptions["numberFallback"] {
    return this.opts.numberFallback
  }

  toStoreValue(value: JsonValue): AttributeValue {
    return toStoreValue(value)
  }

  fromStoreValue(attr: AttributeValue): JsonValue {
    return fromStoreValue(attr, this.unmarshallOptions)
  }

  toStoreItem(value: JsonObject): AttributeMap {
    return toStoreItem(value)
  }

  fromStoreItem(item: AttributeMap): JsonObject {
    return fromStoreItem(item, this.unmarshallOptions)
  }

  encodeTyped<T>(value: T, serializer: Serializer<T>): AttributeValue {
    return encodeTyped(value, serializer)
  }

  decodeTyped<T>(attr: AttributeValue, serializer: Serializer<T>): T {
    return decodeTyped(attr, serializer, this.unmarshallOptions)
  }

  encodeTypedItem<T>(value: T, serializer: Serializer<T>): AttributeMap {
    return encodeTypedItem(value, serializer)
  }

  decodeTypedItem<T>(item: AttributeMap, serializer: Serializer<T>): T {
    return decodeTypedItem(item, serializer, this.unmarshallOptions)
  }
}
