import type { JsonValue } from "../../ports/json-value"
import { toStoreItem, toStoreValue } from "../marshall"

describe("toStoreValue", () => {
  it("encodes null as NULL", () => {
    expect(toStoreValue(null)).toStrictEqual({ NULL: true })
  })

  it("encodes booleans as BOOL", () => {
    expect(toStoreValue(true)).toStrictEqual({ BOOL: true })
    expect(toStoreValue(false)).toStrictEqual({ BOOL: false })
  })

  it("encodes numbers as N text", () => {
    expect(toStoreValue(42)).toStrictEqual({ N: "42" })
    expect(toStoreValue(-0.25)).toStrictEqual({ N: "-0.25" })
    expect(toStoreValue(1e21)).toStrictEqual({ N: "1.0e+21" })
    expect(toStoreValue(9223372036854775807n)).toStrictEqual({ N: "9223372036854775807" })
  })

  it("encodes non-finite numbers as NULL", () => {
    expect(toStoreValue(Number.NaN)).toStrictEqual({ NULL: true })
    expect(toStoreValue(Number.POSITIVE_INFINITY)).toStrictEqual({ NULL: true })
  })

  it("encodes strings as S, including the empty string", () => {
    expect(toStoreValue("hello")).toStrictEqual({ S: "hello" })
    expect(toStoreValue("")).toStrictEqual({ S: "" })
  })

  it("encodes arrays as L in order", () => {
    expect(toStoreValue(["hello", 123, true, null, { nested: "object" }])).toStrictEqual({
      L: [
        { S: "hello" },
        { N: "123" },
        { BOOL: true },
        { NULL: true },
        { M: { nested: { S: "object" } } },
      ],
    })
  })

  it("encodes holes in sparse arrays as NULL", () => {
    const sparse: JsonValue[] = []
    sparse[1] = "b"

    const encoded = toStoreValue(sparse)

    expect(encoded).toStrictEqual({ L: [{ NULL: true }, { S: "b" }] })
    expect(0 in (encoded.L ?? [])).toBe(true)
  })

  it("encodes negative zero with its sign", () => {
    expect(toStoreValue(-0)).toStrictEqual({ N: "-0.0" })
  })

  it("encodes objects as M", () => {
    expect(toStoreValue({ level1: { level2: { value: 999 } } })).toStrictEqual({
      M: { level1: { M: { level2: { M: { value: { N: "999" } } } } } },
    })
  })

  it("encodes empty containers as empty L and M", () => {
    expect(toStoreValue([])).toStrictEqual({ L: [] })
    expect(toStoreValue({})).toStrictEqual({ M: {} })
  })

  it("never produces set or binary variants", () => {
    const attr = toStoreValue({ tags: ["a", "b"], bytes: [1, 2, 255] })

    expect(attr).toStrictEqual({
      M: {
        tags: { L: [{ S: "a" }, { S: "b" }] },
        bytes: { L: [{ N: "1" }, { N: "2" }, { N: "255" }] },
      },
    })
  })
})

describe("toStoreItem", () => {
  it("encodes each top-level property", () => {
    expect(toStoreItem({ pk: "order#1", total: 12.5, paid: false })).toStrictEqual({
      pk: { S: "order#1" },
      total: { N: "12.5" },
      paid: { BOOL: false },
    })
  })

  it("keeps a __proto__ key as an own attribute", () => {
    const value = JSON.parse('{"__proto__": "x"}')

    const item = toStoreItem(value)

    expect(Object.keys(item)).toEqual(["__proto__"])
    expect(Object.getPrototypeOf(item)).toBe(Object.prototype)
  })
})
