import { describe, expect, it } from "vitest"
import { createCliError, ensureCliError, type ErrorCode } from "./errors"

describe("errors", () => {
  it("creates CliError with mapped exit code and details", () => {
    const error = createCliError("BRANCH_ALREADY_EXISTS", {
      message: "branch 'exp/foo' already exists",
      details: { branch: "exp/foo" },
    })

    expect(error.code).toBe("BRANCH_ALREADY_EXISTS")
    expect(error.exitCode).toBe(4)
    expect(error.details).toEqual({ branch: "exp/foo" })
    expect(error.message).toBe("branch 'exp/foo' already exists")
  })

  it("returns the same object when ensureCliError receives CliError", () => {
    const original = createCliError("NOT_GIT_REPOSITORY", {
      message: "not git",
    })

    expect(ensureCliError(original)).toBe(original)
  })

  it("wraps regular Error as INTERNAL_ERROR", () => {
    const input = new Error("boom")
    const resolved = ensureCliError(input)

    expect(resolved.code).toBe("INTERNAL_ERROR")
    expect(resolved.exitCode).toBe(30)
    expect(resolved.message).toBe("boom")
    expect(resolved.cause).toBe(input)
  })

  it("wraps non-Error values as INTERNAL_ERROR with stringified detail", () => {
    const resolved = ensureCliError({ foo: "bar" })

    expect(resolved.code).toBe("INTERNAL_ERROR")
    expect(resolved.message).toBe("An unexpected error occurred")
    expect(resolved.details.value).toBe("[object Object]")
  })

  it("maps representative codes to exit codes", () => {
    const cases: ReadonlyArray<[ErrorCode, number]> = [
      ["INVALID_NAME", 3],
      ["INVALID_CONFIG", 3],
      ["ALREADY_EXISTS", 4],
      ["TMUX_REQUIRED", 5],
      ["PATH_NOT_FOUND", 6],
      ["GIT_COMMAND_FAILED", 20],
      ["CHILD_PROCESS_FAILED", 21],
      ["CANCELLED", 130],
    ]

    for (const [code, exitCode] of cases) {
      expect(createCliError(code, { message: code }).exitCode).toBe(exitCode)
    }
  })
})
