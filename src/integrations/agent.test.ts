import { beforeEach, describe, expect, it, vi } from "vitest"
import { execa } from "execa"
import { buildAgentCommand, formatAgentCommand, runAgent } from "./agent"

vi.mock("execa", () => {
  return {
    execa: vi.fn(),
  }
})

const mockedExeca = vi.mocked(execa)

beforeEach(() => {
  mockedExeca.mockReset()
})

describe("buildAgentCommand", () => {
  it("passes extra directories and flags to the default agent", () => {
    expect(
      buildAgentCommand({
        agent: "claude",
        flags: ["--model", "sonnet"],
        workdir: "/ws/projects/app/api",
        extraDirs: ["/ws/projects/app/web"],
      }),
    ).toEqual({
      file: "claude",
      args: ["--add-dir", "/ws/projects/app/web", "--model", "sonnet"],
      cwd: "/ws/projects/app/api",
    })
  })

  it("falls back to the default agent for an empty command", () => {
    expect(buildAgentCommand({ agent: "  ", workdir: "/ws/x" })).toEqual({ file: "claude", args: [], cwd: "/ws/x" })
  })

  it("splits custom commands and replaces dot with the workdir", () => {
    const command = buildAgentCommand({
      agent: "aider  --watch .",
      flags: ["--yes"],
      workdir: "/ws/x",
      extraDirs: ["/ignored"],
    })

    expect(command).toEqual({ file: "aider", args: ["--watch", "/ws/x", "--yes"], cwd: "/ws/x" })
    expect(formatAgentCommand(command)).toBe("aider --watch /ws/x --yes")
  })
})

describe("runAgent", () => {
  it("runs the agent with inherited stdio", async () => {
    mockedExeca.mockResolvedValueOnce({ exitCode: 0 } as Awaited<ReturnType<typeof execa>>)

    await runAgent({ file: "claude", args: ["--resume"], cwd: "/ws/x" })

    expect(mockedExeca).toHaveBeenCalledWith("claude", ["--resume"], { cwd: "/ws/x", stdio: "inherit" })
  })

  it("reports a missing binary as a dependency error", async () => {
    mockedExeca.mockRejectedValueOnce(Object.assign(new Error("spawn claude ENOENT"), { code: "ENOENT" }))

    await expect(runAgent({ file: "claude", args: [], cwd: "/ws/x" })).rejects.toMatchObject({
      code: "DEPENDENCY_MISSING",
      message: "Agent command not found: claude",
    })
  })

  it("reports a non-zero exit as a child process failure", async () => {
    mockedExeca.mockRejectedValueOnce(Object.assign(new Error("Command failed"), { exitCode: 2 }))

    await expect(runAgent({ file: "aider", args: [], cwd: "/ws/x" })).rejects.toMatchObject({
      code: "CHILD_PROCESS_FAILED",
      exitCode: 21,
      message: "aider exited with code 2",
    })
  })
})
