import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level with and without fields", () => {
    const logger = createNullLogger()

    expect(logger.trace("evicted entry")).toBeUndefined()
    expect(logger.debug("evicted entry", { reason: "capacity" })).toBeUndefined()
    expect(logger.info("cleared cache", { dropped: 0 })).toBeUndefined()
    expect(logger.warn("shrunk", { capacity: 1, size: 2 })).toBeUndefined()
    expect(logger.error("failed", { err: new Error("boom") })).toBeUndefined()
    expect(logger.fatal("stopping")).toBeUndefined()
  })

  it("child() returns a fresh no-op logger", () => {
    const parent = new NullLogger()
    const child = parent.child({ module: "cache", policy: "lfu" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(child).not.toBe(parent)
    expect(child.debug("evicted entry")).toBeUndefined()
  })
})
