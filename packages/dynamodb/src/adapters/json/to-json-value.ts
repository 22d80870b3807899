import type { JsonValue } from "../../ports/json-value"

type WithToJSON = { toJSON: (key: string) => unknown }

/**
 * Convert a plain JavaScript value to the generic value model the way
 * `JSON.stringify` would, without going through text.
 *
 * - `toJSON()` is honoured, so a `Date` becomes its ISO string
 * - `undefined`, functions and symbols are dropped from objects and become
 *   `null` in arrays
 * - `NaN` and infinities become `null`
 * - `bigint` is kept and a `Uint8Array` becomes an array of byte numbers
 *
 * @throws TypeError for cycles, `Map`, `Set`, and a top-level value with no
 * representation at all.
 */
export function toJsonValue(value: unknown): JsonValue {
  const converted = convert(value, "", "$", new Set())

  if (converted === undefined) {
    throw new TypeError(`A value of type ${typeof value} has no generic representation`)
  }

  return converted
}

function convert(
  value: unknown,
  key: string,
  path: string,
  ancestors: Set<object>,
): JsonValue | undefined {
  // toJSON runs once per value; what it returns is converted as is
  const resolved = isObject(value) && hasToJSON(value) ? value.toJSON(key) : value

  return convertResolved(resolved, path, ancestors)
}

function convertResolved(
  value: unknown,
  path: string,
  ancestors: Set<object>,
): JsonValue | undefined {
  if (value === null) return null

  if (typeof value === "boolean" || typeof value === "string" || typeof value === "bigint") {
    return value
  }

  if (typeof value === "number") return Number.isFinite(value) ? value : null

  if (!isObject(value)) return undefined

  if (value instanceof Uint8Array) return Array.from(value)

  if (value instanceof Map || value instanceof Set) {
    throw new TypeError(`${path}: ${value.constructor.name} has no generic representation`)
  }

  if (ancestors.has(value)) throw new TypeError(`${path}: cyclic reference`)

  ancestors.add(value)

  try {
    if (Array.isArray(value)) {
      // Array.from visits holes, which map would skip
      return Array.from(
        value,
        (item: unknown, index) =>
          convert(item, String(index), `${path}[${index}]`, ancestors) ?? null,
      )
    }

    const entries: [string, JsonValue][] = []

    for (const [k, v] of Object.entries(value)) {
      const converted = convert(v, k, `${path}.${k}`, ancestors)
      if (converted !== undefined) entries.push([k, converted])
    }

    return Object.fromEntries(entries)
  } finally {
    ancestors.delete(value)
  }
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null
}

function hasToJSON(value: object): value is WithToJSON {
  return "toJSON" in value && typeof value.toJSON === "function"
}
