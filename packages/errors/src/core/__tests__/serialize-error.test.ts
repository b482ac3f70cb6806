import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("rendering failed", {
        code: "avatar_rendering_failed",
        context: { size: 64 },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "avatar_rendering_failed",
        message: "rendering failed",
        context: { size: 64 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("includes stack only when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack when it is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("EACCES")
      const middle = new BaseError("write denied", { code: "store_not_permitted", cause: root })
      const outer = new BaseError("not found", { code: "avatar_not_found", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("store_not_permitted")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("EACCES")
    })

    it("omits cause when undefined", () => {
      expect("cause" in serializeError(new BaseError("x", { code: "test" }))).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("serializes with code unknown and non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "not a function",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })

  describe("non-Error values", () => {
    it("wraps a string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("something went wrong")
    })

    it("wraps other values in context.value", () => {
      const obj = { foo: "bar" }

      expect(serializeError(obj).context).toEqual({ value: obj })
      expect(serializeError(obj).message).toBe("Unknown error")
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
