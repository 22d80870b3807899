import type { JsonValue } from "./json-value"

/**
 * Moves an application type `T` in and out of the generic value model.
 *
 * @remarks
 * The codec makes no assumption about how this is done (schema, hand-written
 * mapping, ...). Both methods may throw; the typed codec operations turn the
 * throw into `SerializationError` / `DeserializationError`.
 *
 * @example
 * ```ts
 * const orderSerializer: Serializer<Order> = {
 *   toGenericValue: (order) => ({ id: order.id, total: order.total }),
 *   fromGenericValue: (value) => orderSchema.parse(value),
 * }
 * ```
 */
export interface Serializer<T> {
  toGenericValue(value: T): JsonValue

  /**
   * Must throw when `value` does not have the shape `T` expects.
   */
  fromGenericValue(value: JsonValue): T
}
