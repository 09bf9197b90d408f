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
      const err = new BaseError("Key is not present", {
        code: "key_not_found",
        context: { key: "k:1" },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "key_not_found",
        message: "Key is not present",
        context: { key: "k:1" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("x", { code: "x" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack when the stack is missing", () => {
      const err = new BaseError("x", { code: "x" })
      err.stack = undefined

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "middle", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("middle")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })

    it("omits cause when there is none", () => {
      const serialized = serializeError(new BaseError("x", { code: "x" }))

      expect("cause" in serialized).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and marks non-operational", () => {
      const serialized = serializeError(new RangeError("out of range"))

      expect(serialized).toEqual({
        name: "RangeError",
        code: "unknown",
        message: "out of range",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("serializes the cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("something went wrong")
    })

    it("keeps other values in context", () => {
      const value = { foo: "bar" }

      const serialized = serializeError(value)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value })
      expect(serialized.isOperational).toBe(false)
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
