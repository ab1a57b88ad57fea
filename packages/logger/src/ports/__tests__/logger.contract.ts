import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ service: "cache-simulator" })
      const child = parent.child({ policy: "lru" })

      child.info("cache created")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        service: "cache-simulator",
        policy: "lru",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ policy: "lru" }).child({ policy: "lfu" })

      child.info("cache created")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.policy).toBe("lfu")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ policy: "mru" })
      const child = parent.child({ capacity: 2 })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ policy: "mru" })
      expect(logs[0]?.payload).not.toHaveProperty("capacity")
      expect(logs[1]?.payload).toMatchObject({ policy: "mru", capacity: 2 })

      clear()

      expect(read()).toEqual([])
    })

    it("per-call meta is included in the entry", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ policy: "lru" }).debug("cache hit", { key: "7" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ policy: "lru", key: "7" })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
