import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ operation: "fetch-profile" })
      const child = parent.child({ sequence: "s-1" })

      child.info("retry scheduled")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        operation: "fetch-profile",
        sequence: "s-1",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ sequence: "s-1" }).child({ sequence: "s-2" })

      child.info("retry scheduled")

      expect(read()[0]?.payload.sequence).toBe("s-2")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ operation: "fetch-profile" })
      const child = parent.child({ sequence: "s-1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("sequence")
      expect(logs[1]?.payload).toMatchObject({ operation: "fetch-profile", sequence: "s-1" })
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ operation: "fetch-profile" }).debug("retry scheduled", {
        attempt: 2,
        retryAt: 1_500,
      })

      expect(read()[0]?.payload).toMatchObject({
        operation: "fetch-profile",
        attempt: 2,
        retryAt: 1_500,
      })
    })

    it("stamps construction context on every entry", () => {
      const { logger, read } = h.make({ level: "trace", context: { service: "billing" } })

      logger.info("first")
      logger.child({ sequence: "s-1" }).warn("second")

      expect(read().map((l) => l.payload.service)).toEqual(["billing", "billing"])
    })

    it("clear() drops captured entries", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("before")
      clear()
      logger.info("after")

      expect(read()).toHaveLength(1)
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
