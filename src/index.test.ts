import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

const runMock = vi.fn<(args: string[]) => Promise<number>>()

vi.mock("./cli/index", () => {
  return {
    createCli: () => ({ run: runMock }),
  }
})

const flushMain = async (): Promise<void> => {
  await Promise.resolve()
  await new Promise<void>((resolve) => {
    setTimeout(resolve, 0)
  })
}

describe("entrypoint", () => {
  let debugBackup: string | undefined

  beforeEach(() => {
    vi.resetModules()
    runMock.mockReset()
    debugBackup = process.env.GROVE_DEBUG
    delete process.env.GROVE_DEBUG
  })

  afterEach(() => {
    if (debugBackup === undefined) {
      delete process.env.GROVE_DEBUG
    } else {
      process.env.GROVE_DEBUG = debugBackup
    }
    vi.restoreAllMocks()
  })

  it("does not exit explicitly on success", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
    runMock.mockResolvedValue(0)

    await import("./index")
    await flushMain()

    expect(runMock).toHaveBeenCalledTimes(1)
    expect(exitSpy).not.toHaveBeenCalled()
  })

  it("exits with the command's exit code", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
    runMock.mockResolvedValue(6)

    await import("./index")
    await flushMain()

    expect(exitSpy).toHaveBeenCalledWith(6)
  })

  it("reports a crash and exits with the internal error code", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    runMock.mockRejectedValue(new Error("stdout closed"))

    await import("./index")
    await flushMain()

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledWith("grove: stdout closed")
    expect(exitSpy).toHaveBeenCalledWith(30)
  })

  it("adds the stack trace when GROVE_DEBUG is set", async () => {
    process.env.GROVE_DEBUG = "true"
    const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const error = new Error("stdout closed")
    error.stack = "stack-for-test"
    runMock.mockRejectedValue(error)

    await import("./index")
    await flushMain()

    expect(errorSpy).toHaveBeenNthCalledWith(1, "grove: stdout closed")
    expect(errorSpy).toHaveBeenNthCalledWith(2, "stack-for-test")
    expect(exitSpy).toHaveBeenCalledWith(30)
  })

  it("stringifies non-Error throws", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    runMock.mockRejectedValue("failed")

    await import("./index")
    await flushMain()

    expect(errorSpy).toHaveBeenCalledWith("grove: failed")
    expect(exitSpy).toHaveBeenCalledWith(30)
  })
})
