import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One record as the adapter under test emitted it. */
export type LoggedRecord = {
  level: LogLevelName
  payload: Record<string, unknown>
}

/**
 * Builds a fresh adapter at `level` together with what it has written so far.
 */
export type LoggerUnderTest = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => LoggedRecord[]
    clear: () => void
  }
}

export function describeLoggerContract(h: LoggerUnderTest) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ command: "make" }).child({ service: "slack" })

      child.info("sent")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ command: "make", service: "slack" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ service: "banner" }).child({ service: "speech" }).info("sent")

      expect(read()[0]?.payload.service).toBe("speech")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ command: "make" })
      const child = parent.child({ service: "slack" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("service")
      expect(logs[1]?.payload).toMatchObject({ command: "make", service: "slack" })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta is included", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "dispatch" }).warn("failed", { service: "pushover" })

      expect(read()[0]?.payload).toMatchObject({ module: "dispatch", service: "pushover" })
    })

    it("suppresses records below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
