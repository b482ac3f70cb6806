import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ requestId: "req-1" })
      const child = parent.child({ userId: "alice" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        requestId: "req-1",
        userId: "alice",
      })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ cacheKey: "a.png" }).child({ cacheKey: "b.png" })

      child.info("hello")

      expect(read()[0]?.payload.cacheKey).toBe("b.png")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ requestId: "req-1" })
      const child = parent.child({ userId: "alice" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("userId")
      expect(logs[1]?.payload).toMatchObject({ requestId: "req-1", userId: "alice" })
    })

    it("per-call meta is included", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ requestId: "req-1" }).info("hello", { status: 404 })

      expect(read()[0]?.payload).toMatchObject({ requestId: "req-1", status: 404 })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("clear() empties the captured entries", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.debug("one")
      clear()

      expect(read()).toEqual([])
    })
  })
}
