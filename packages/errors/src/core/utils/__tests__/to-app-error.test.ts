import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns a BaseError unchanged", () => {
    const err = new BaseError("original", { code: "original", context: { id: 1 } })

    expect(toAppError(err)).toBe(err)
  })

  describe("standard Error input", () => {
    it("wraps it with the original as cause", () => {
      const err = new Error("disk full")

      const result = toAppError(err)

      expect(result).toBeInstanceOf(BaseError)
      expect(result.message).toBe("disk full")
      expect(result.cause).toBe(err)
      expect(result.code).toBe("unknown")
      expect(result.isOperational).toBe(false)
    })

    it("uses the fallback code when provided", () => {
      expect(toAppError(new Error("x"), "loader_failed").code).toBe("loader_failed")
    })
  })

  describe("non-Error input", () => {
    it("uses a string as message with empty context", () => {
      const result = toAppError("boom")

      expect(result.message).toBe("boom")
      expect(result.context).toEqual({})
    })

    it("keeps other values in context", () => {
      const result = toAppError(42)

      expect(result.message).toBe("Unknown error")
      expect(result.context).toEqual({ value: 42 })
      expect(result.isOperational).toBe(false)
    })
  })
})
