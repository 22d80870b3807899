import { isInt64 } from "./int64"

/**
 * Render a number as `N` attribute text.
 *
 * This is the only place numbers are turned into text, and its output is
 * shaped for {@link parseNumber}: integers within 64-bit range are written
 * digit for digit, everything else carries a decimal point, so `1e21` becomes
 * `"1.0e+21"` and the double `2 ** 64` becomes `"1.8446744073709552e+19"`.
 *
 * @throws RangeError for `NaN` and infinities, which have no `N` form.
 */
export function formatNumber(value: number | bigint): string {
  if (typeof value === "bigint") return value.toString()

  if (!Number.isFinite(value)) {
    throw new RangeError(`${value} cannot be rendered as a number attribute`)
  }

  // "-0" would read back as the integer 0
  if (Object.is(value, -0)) return "-0.0"

  if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
    const big = BigInt(value)

    return isInt64(big) ? big.toString() : withDecimalPoint(value.toExponential())
  }

  return withDecimalPoint(String(value))
}

// "1e-7" -> "1.0e-7"
function withDecimalPoint(text: string): string {
  const exponentAt = text.indexOf("e")
  if (exponentAt === -1 || text.includes(".")) return text

  return `${text.slice(0, exponentAt)}.0${text.slice(exponentAt)}`
}
