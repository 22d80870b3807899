import { parseNumber } from "../parse-number"

describe("parseNumber", () => {
  describe("integers", () => {
    it.each([
      ["0", 0],
      ["42", 42],
      ["-17", -17],
      ["+5", 5],
      ["007", 7],
      ["9007199254740991", Number.MAX_SAFE_INTEGER],
      ["1152921504606846976", 2 ** 60],
      ["-9223372036854775808", -(2 ** 63)],
    ])("parses %s as a number", (text, value) => {
      expect(parseNumber(text)).toStrictEqual({ kind: "number", value })
    })

    it("keeps integers a double cannot hold exactly as bigint", () => {
      expect(parseNumber("9223372036854775807")).toStrictEqual({
        kind: "number",
        value: 9223372036854775807n,
      })
      expect(parseNumber("9007199254740993")).toStrictEqual({
        kind: "number",
        value: 9007199254740993n,
      })
    })

    it("rejects integers beyond 64-bit range", () => {
      expect(parseNumber("999999999999999999999")).toStrictEqual({
        kind: "invalid",
        reason: "out_of_range",
      })
      expect(parseNumber("9223372036854775808")).toStrictEqual({
        kind: "invalid",
        reason: "out_of_range",
      })
      expect(parseNumber("-9223372036854775809")).toStrictEqual({
        kind: "invalid",
        reason: "out_of_range",
      })
    })
  })

  describe("decimals", () => {
    it.each([
      ["123.456", 123.456],
      ["-0.5", -0.5],
      ["1.", 1],
      [".5", 0.5],
      ["2.50", 2.5],
      ["1.0e+21", 1e21],
      ["1.5E-7", 1.5e-7],
      ["9.223372036854776e+18", 2 ** 63],
    ])("parses %s as a double", (text, value) => {
      expect(parseNumber(text)).toStrictEqual({ kind: "number", value })
    })

    it("rejects decimals that overflow a double", () => {
      expect(parseNumber("1.0e400")).toStrictEqual({ kind: "invalid", reason: "out_of_range" })
    })
  })

  it.each(["123abc", "", "-", "1.2.3", ".", "abc.def", " 1", "1 ", "0x10", "1e5", "1_000"])(
    "reports %j as malformed",
    (text) => {
      expect(parseNumber(text)).toStrictEqual({ kind: "invalid", reason: "malformed" })
    },
  )
})
