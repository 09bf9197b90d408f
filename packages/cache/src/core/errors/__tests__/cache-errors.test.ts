import { isAppError } from "@stowage/errors"
import { assertCapacity, InvalidCapacityError } from "../invalid-capacity-error"
import { isKeyNotFoundError, KeyNotFoundError } from "../key-not-found-error"

describe("KeyNotFoundError", () => {
  it("echoes primitive keys in message and context", () => {
    const err = new KeyNotFoundError("user:1")

    expect(err.name).toBe("KeyNotFoundError")
    expect(err.code).toBe("key_not_found")
    expect(err.message).toBe("Key not found: user:1")
    expect(err.context).toEqual({ key: "user:1" })
    expect(err.isOperational).toBe(true)
    expect(err.isRetryable).toBe(false)
  })

  it("keeps number keys as numbers", () => {
    const err = new KeyNotFoundError(42)

    expect(err.context).toEqual({ key: 42 })
  })

  it("leaves object keys out", () => {
    const err = new KeyNotFoundError({ id: 1 })

    expect(err.message).toBe("Key not found")
    expect(err.context).toEqual({})
  })

  it("is an AppError", () => {
    expect(isAppError(new KeyNotFoundError("a"))).toBe(true)
  })

  it("serializes through toJSON", () => {
    const json = new KeyNotFoundError("a").toJSON()

    expect(json.code).toBe("key_not_found")
    expect(json.context).toEqual({ key: "a" })
  })
})

describe("isKeyNotFoundError", () => {
  it("matches KeyNotFoundError", () => {
    expect(isKeyNotFoundError(new KeyNotFoundError("a"))).toBe(true)
  })

  it("narrows to the key_not_found code", () => {
    const caught: unknown = new KeyNotFoundError("a")

    if (!isKeyNotFoundError(caught)) throw new Error("expected a KeyNotFoundError")

    const code: "key_not_found" = caught.code
    expect(code).toBe("key_not_found")
    expect(caught.context).toEqual({ key: "a" })
  })

  it("rejects other errors and non-errors", () => {
    expect(isKeyNotFoundError(new InvalidCapacityError(-1))).toBe(false)
    expect(isKeyNotFoundError(new Error("Key not found"))).toBe(false)
    expect(isKeyNotFoundError("key_not_found")).toBe(false)
    expect(isKeyNotFoundError(null)).toBe(false)
  })
})

describe("assertCapacity", () => {
  it.each([0, 1, 1000, Number.MAX_SAFE_INTEGER])("accepts %s", (capacity) => {
    expect(() => assertCapacity(capacity)).not.toThrow()
  })

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY, 2 ** 53])(
    "rejects %s",
    (capacity) => {
      expect(() => assertCapacity(capacity)).toThrow(InvalidCapacityError)
    },
  )

  it("reports the bad value as a programmer error", () => {
    try {
      assertCapacity(-3)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCapacityError)
      if (!(err instanceof InvalidCapacityError)) return

      expect(err.code).toBe("invalid_capacity")
      expect(err.isOperational).toBe(false)
      expect(err.context).toEqual({ capacity: -3 })
      expect(err.message).toBe("Capacity must be a non-negative safe integer, got -3")
    }
  })
})
