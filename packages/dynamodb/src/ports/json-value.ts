/**
 * The generic value model: whatever `JSON.parse` can produce, plus `bigint`
 * for 64-bit integers outside `Number.MAX_SAFE_INTEGER`.
 *
 * Any `bigint` encodes, but decoding only yields one for integers that a
 * double cannot hold exactly and that fit in 64 bits: `5n` decodes as `5`, and
 * `2n ** 64n` is out of range and takes the number fallback.
 */
export type JsonPrimitive = null | boolean | number | bigint | string

export type JsonArray = JsonValue[]

export type JsonObject = { [key: string]: JsonValue }

export type JsonValue = JsonPrimitive | JsonArray | JsonObject
