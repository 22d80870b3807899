import type { ZodType } from "zod"
import type { JsonValue } from "../../ports/json-value"
import type { Serializer } from "../../ports/serializer"
import { toJsonValue } from "../json/to-json-value"

/**
 * Serializer backed by a zod schema.
 *
 * Encoding follows JSON semantics (see {@link toJsonValue}); decoding parses
 * with the schema and throws its `ZodError` on mismatch. Use `z.coerce.date()`
 * or similar for fields whose generic form differs from the typed one.
 */
export class ZodSerializer<T> implements Serializer<T> {
  constructor(private readonly schema: ZodType<T>) {}

  toGenericValue(value: T): JsonValue {
    return toJsonValue(value)
  }

  fromGenericValue(value: JsonValue): T {
    return this.schema.parse(value)
  }
}

export function createZodSerializer<T>(schema: ZodType<T>): ZodSerializer<T> {
  return new ZodSerializer<T>(schema)
}
