import { isInt64 } from "./int64"

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const INTEGER_PATTERN = /^[+-]?\d+$/

export type InvalidNumberReason = "malformed" | "out_of_range"

export type ParsedNumber =
  | { kind: "number"; value: number | bigint }
  | { kind: "invalid"; reason: InvalidNumberReason }

/**
 * Parse `N` attribute text. Never throws.
 *
 * Text with a `.` is read as a double, anything else as a 64-bit signed
 * integer. Integers come back as `number` when the double is exact and as
 * `bigint` otherwise, so `"9223372036854775807"` keeps every digit.
 */
export function parseNumber(text: string): ParsedNumber {
  if (text.includes(".")) {
    if (!DECIMAL_PATTERN.test(text)) return { kind: "invalid", reason: "malformed" }

    const value = Number(text)

    return Number.isFinite(value)
      ? { kind: "number", value }
      : { kind: "invalid", reason: "out_of_range" }
  }

  if (!INTEGER_PATTERN.test(text)) return { kind: "invalid", reason: "malformed" }

  const big = BigInt(text)
  if (!isInt64(big)) return { kind: "invalid", reason: "out_of_range" }

  const value = Number(big)

  return { kind: "number", value: BigInt(value) === big ? value : big }
}
