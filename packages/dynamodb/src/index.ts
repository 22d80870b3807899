export { toJsonValue } from "./adapters/json/to-json-value"
export { createZodSerializer, ZodSerializer } from "./adapters/zod/zod-serializer"
export {
  CODEC_ENV_PREFIX,
  type CodecConfig,
  codecConfigSchema,
  loadCodecConfig,
} from "./config/codec-config"
export { AttributeCodec, type AttributeCodecDeps } from "./core/attribute-codec"
export { createAttributeCodec, createAttributeCodecFromConfig } from "./core/create"
export { DeserializationError, SerializationError } from "./core/errors"
export { toStoreItem, toStoreValue } from "./core/marshall"
export { formatNumber } from "./core/numbers/format-number"
export { type InvalidNumberReason, type ParsedNumber, parseNumber } from "./core/numbers/parse-number"
export {
  decodeTyped,
  decodeTypedItem,
  encodeTyped,
  encodeTypedItem,
} from "./core/typed/typed-codec"
export {
  fromStoreItem,
  fromStoreValue,
  type NumberFallbackEvent,
  type UnmarshallOptions,
} from "./core/unmarshall"
export type { AttributeMap, AttributeValue } from "./ports/attribute-value"
export {
  type AttributeCodecOptions,
  type NumberFallback,
  numberFallbacks,
} from "./ports/codec-options"
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "./ports/json-value"
export type { Serializer } from "./ports/serializer"
