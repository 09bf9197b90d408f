import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("emits the message and per-call fields", () => {
      const { logger, entries } = h.create("trace")

      logger.debug("evicted entry", { reason: "capacity", size: 3 })

      expect(entries()).toEqual([
        { level: "debug", message: "evicted entry", fields: { reason: "capacity", size: 3 } },
      ])
    })

    it("child() carries the parent context into every entry", () => {
      const { logger, entries } = h.create("trace")

      const cacheLogger = logger.child({ module: "cache" }).child({ policy: "lru" })
      cacheLogger.info("cleared cache", { dropped: 2 })

      expect(entries()[0]?.fields).toEqual({ module: "cache", policy: "lru", dropped: 2 })
    })

    it("a nested child overrides a conflicting parent field", () => {
      const { logger, entries } = h.create("trace")

      logger.child({ policy: "lru" }).child({ policy: "lfu" }).info("hello")

      expect(entries()[0]?.fields.policy).toBe("lfu")
    })

    it("child() leaves the parent's context untouched", () => {
      const { logger, entries, reset } = h.create("trace")

      const parent = logger.child({ module: "cache" })
      parent.child({ cacheName: "sessions" })
      parent.info("parent")

      expect(entries()[0]?.fields).toEqual({ module: "cache" })

      reset()
      expect(entries()).toEqual([])
    })

    it("suppresses entries below the minimum level", () => {
      const { logger, entries } = h.create("warn")

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.fatal("fatal")

      expect(entries().map((entry) => entry.level)).toEqual(["warn", "fatal"])
    })
  })
}
