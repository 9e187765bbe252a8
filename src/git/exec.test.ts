import { beforeEach, describe, expect, it, vi } from "vitest"
import { execa } from "execa"
import { doesGitRefExist, readGitOutput, runGitCommand } from "./exec"

vi.mock("execa", () => {
  return {
    execa: vi.fn(),
  }
})

const mockedExeca = vi.mocked(execa)

const resolved = (stdout: string, exitCode = 0): Awaited<ReturnType<typeof execa>> => {
  return {
    stdout,
    stderr: "",
    exitCode,
  } as Awaited<ReturnType<typeof execa>>
}

beforeEach(() => {
  mockedExeca.mockReset()
})

describe("runGitCommand", () => {
  it("returns stdout/stderr/exitCode when command succeeds", async () => {
    mockedExeca.mockResolvedValueOnce(resolved("ok"))

    const result = await runGitCommand({
      cwd: "/repo",
      args: ["status", "--porcelain"],
    })

    expect(result).toEqual({
      stdout: "ok",
      stderr: "",
      exitCode: 0,
    })
    expect(mockedExeca).toHaveBeenCalledWith("git", ["status", "--porcelain"], {
      cwd: "/repo",
      reject: true,
    })
  })

  it("wraps execa errors as GIT_COMMAND_FAILED", async () => {
    const execaError = Object.assign(new Error("git failed"), {
      stderr: "fatal: bad revision",
      stdout: "",
      shortMessage: "Command failed with exit code 128",
      exitCode: 128,
    })
    mockedExeca.mockRejectedValueOnce(execaError)

    await expect(
      runGitCommand({
        cwd: "/repo",
        args: ["rev-parse", "--verify", "missing"],
      }),
    ).rejects.toMatchObject({
      code: "GIT_COMMAND_FAILED",
      message: "git rev-parse failed: fatal: bad revision",
      details: {
        cwd: "/repo",
        exitCode: 128,
        command: ["git", "rev-parse", "--verify", "missing"],
        shortMessage: "Command failed with exit code 128",
      },
    })
  })
})

describe("readGitOutput", () => {
  it("trims stdout on success and returns null on failure", async () => {
    mockedExeca.mockResolvedValueOnce(resolved("main\n")).mockResolvedValueOnce(resolved("", 1))

    await expect(readGitOutput("/repo", ["rev-parse", "--abbrev-ref", "HEAD"])).resolves.toBe("main")
    await expect(readGitOutput("/repo", ["rev-parse", "--abbrev-ref", "HEAD"])).resolves.toBeNull()
  })

  it("returns null when git cannot be started", async () => {
    mockedExeca.mockRejectedValueOnce(Object.assign(new Error("spawn git ENOENT"), { code: "ENOENT" }))

    await expect(readGitOutput("/repo", ["status"])).resolves.toBeNull()
  })
})

describe("doesGitRefExist", () => {
  it("returns true only when show-ref exits with 0", async () => {
    mockedExeca.mockResolvedValueOnce(resolved("")).mockResolvedValueOnce(resolved("", 1))

    await expect(doesGitRefExist("/repo", "refs/heads/main")).resolves.toBe(true)
    await expect(doesGitRefExist("/repo", "refs/heads/missing")).resolves.toBe(false)

    expect(mockedExeca).toHaveBeenNthCalledWith(1, "git", ["show-ref", "--verify", "--quiet", "refs/heads/main"], {
      cwd: "/repo",
      reject: false,
    })
  })
})
