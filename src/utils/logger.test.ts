import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { createLogger, LogLevel } from "./logger"

const ENV_KEYS = ["GROVE_DEBUG", "GROVE_VERBOSE"] as const

const envBackup = new Map<string, string | undefined>()

beforeEach(() => {
  for (const key of ENV_KEYS) {
    envBackup.set(key, process.env[key])
    delete process.env[key]
  }
})

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = envBackup.get(key)
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }
  envBackup.clear()
  vi.restoreAllMocks()
})

describe("createLogger", () => {
  it("resolves default level from environment variables", () => {
    expect(createLogger().level).toBe(LogLevel.WARN)

    process.env.GROVE_VERBOSE = "true"
    expect(createLogger().level).toBe(LogLevel.INFO)

    process.env.GROVE_DEBUG = "true"
    expect(createLogger().level).toBe(LogLevel.DEBUG)
  })

  it("filters by level and always prints errors", () => {
    const lines: string[] = []
    const logger = createLogger({ level: LogLevel.ERROR, prefix: "[grove]", write: (line) => lines.push(line) })

    logger.error("failed")
    logger.warn("watch out")
    logger.info("info message")
    logger.debug("debug message")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toContain("[grove] Error: failed")
  })

  it("writes info at INFO level", () => {
    const lines: string[] = []
    const logger = createLogger({ level: LogLevel.INFO, write: (line) => lines.push(line) })

    logger.warn("careful")
    logger.info("hello")
    logger.debug("hidden")

    expect(lines).toHaveLength(2)
    expect(lines[1]).toBe("hello")
  })

  it("prints stack trace only in debug mode", () => {
    const lines: string[] = []
    const logger = createLogger({ level: LogLevel.ERROR, write: (line) => lines.push(line) })
    const error = new Error("boom")
    error.stack = "mock-stack"

    logger.error("failed", error)
    expect(lines).toHaveLength(1)

    process.env.GROVE_DEBUG = "true"
    logger.error("failed", error)
    expect(lines).toHaveLength(3)
    expect(lines[2]).toContain("mock-stack")
  })

  it("defaults to console.error", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    createLogger({ level: LogLevel.WARN }).warn("to stderr")

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("to stderr")
  })

  it("inherits prefix and level in child logger", () => {
    const lines: string[] = []
    const child = createLogger({ level: LogLevel.DEBUG, prefix: "[root]", write: (line) => lines.push(line) }).createChild(
      "[child]",
    )

    child.debug("trace")

    expect(child.level).toBe(LogLevel.DEBUG)
    expect(lines[0]).toContain("[root] [child] [DEBUG] trace")
  })
})
