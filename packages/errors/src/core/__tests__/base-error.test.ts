import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("shape mismatch", { code: "deserialization_error" })

      expect(err.message).toBe("shape mismatch")
      expect(err.code).toBe("deserialization_error")
    })

    it("names the error after its class", () => {
      class CodecFailure extends BaseError<"codec_failure"> {}

      const err = new CodecFailure("boom", { code: "codec_failure" })

      expect(err.name).toBe("CodecFailure")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("applies defaults", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
      expect(err.cause).toBeUndefined()
    })

    it("accepts context, cause and flags", () => {
      const cause = new TypeError("root cause")
      const err = new BaseError("wrapped", {
        code: "test",
        context: { path: "user.name" },
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.context).toEqual({ path: "user.name" })
      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes context, including the empty default", () => {
      expect(Object.isFrozen(new BaseError("a", { code: "test" }).context)).toBe(true)
      expect(
        Object.isFrozen(new BaseError("b", { code: "test", context: { k: 1 } }).context),
      ).toBe(true)
    })

    it("copies context so later caller mutations do not leak in", () => {
      const context: Record<string, unknown> = { attempt: 1 }
      const err = new BaseError("test", { code: "test", context })

      context.attempt = 2

      expect(err.context).toEqual({ attempt: 1 })
    })

    it("captures a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { id: 123 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { id: 123 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what JSON.stringify uses", () => {
      const err = new BaseError("test", { code: "test" })

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "BaseError",
        code: "test",
        message: "test",
        context: {},
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
