import { mkdtemp, rm, stat } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

vi.mock("./exec", () => {
  return {
    runGitCommand: vi.fn(),
  }
})

vi.mock("./branch", () => {
  return {
    checkBranch: vi.fn(),
    fetchOrigin: vi.fn(),
    getDefaultBranch: vi.fn(),
    hasOriginRemote: vi.fn(),
  }
})

import { createCliError } from "../core/errors"
import { checkBranch, getDefaultBranch, hasOriginRemote } from "./branch"
import { runGitCommand } from "./exec"
import {
  createWorktreeByStrategy,
  createWorktreeNew,
  parseWorktreePorcelain,
  removeWorktreeOrDirectory,
} from "./worktree"

const mockedRunGitCommand = vi.mocked(runGitCommand)
const mockedCheckBranch = vi.mocked(checkBranch)
const mockedGetDefaultBranch = vi.mocked(getDefaultBranch)
const mockedHasOriginRemote = vi.mocked(hasOriginRemote)

const ok = (stdout = "") => ({ stdout, stderr: "", exitCode: 0 })

const tempDirs = new Set<string>()

beforeEach(() => {
  mockedRunGitCommand.mockReset()
  mockedCheckBranch.mockReset()
  mockedGetDefaultBranch.mockReset()
  mockedHasOriginRemote.mockReset()
  mockedRunGitCommand.mockResolvedValue(ok())
})

afterEach(async () => {
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("parseWorktreePorcelain", () => {
  it("parses branch and detached entries", () => {
    const raw = [
      "worktree /repo",
      "HEAD aaa",
      "branch refs/heads/main",
      "",
      "worktree /base/experiments/repo-x",
      "HEAD bbb",
      "detached",
      "",
      "",
    ].join("\0")

    expect(parseWorktreePorcelain(raw)).toEqual([
      { path: "/repo", head: "aaa", branch: "main" },
      { path: "/base/experiments/repo-x", head: "bbb", branch: null },
    ])
  })
})

describe("createWorktreeNew", () => {
  it("branches from origin's default branch when origin exists", async () => {
    mockedCheckBranch.mockResolvedValueOnce({ status: "not-found", localAhead: 0, remoteBehind: 0, diverged: false })
    mockedHasOriginRemote.mockResolvedValueOnce(true)
    mockedGetDefaultBranch.mockResolvedValueOnce("main")

    await createWorktreeNew({ repo: "/repo", path: "/base/experiments/repo-a", branch: "exp/a" })

    expect(mockedRunGitCommand).toHaveBeenCalledWith({
      cwd: "/repo",
      args: ["worktree", "add", "-b", "exp/a", "/base/experiments/repo-a", "origin/main"],
    })
  })

  it("branches from HEAD without an origin remote", async () => {
    mockedCheckBranch.mockResolvedValueOnce({ status: "not-found", localAhead: 0, remoteBehind: 0, diverged: false })
    mockedHasOriginRemote.mockResolvedValueOnce(false)

    await createWorktreeNew({ repo: "/repo", path: "/wt", branch: "exp/a" })

    expect(mockedRunGitCommand).toHaveBeenCalledWith({
      cwd: "/repo",
      args: ["worktree", "add", "-b", "exp/a", "/wt", "HEAD"],
    })
  })

  it("refuses a branch that already exists anywhere", async () => {
    mockedCheckBranch.mockResolvedValueOnce({ status: "remote-only", localAhead: 0, remoteBehind: 0, diverged: false })

    await expect(createWorktreeNew({ repo: "/repo", path: "/wt", branch: "exp/a" })).rejects.toMatchObject({
      code: "BRANCH_ALREADY_EXISTS",
      message: "branch 'exp/a' already exists",
    })
    expect(mockedRunGitCommand).not.toHaveBeenCalled()
  })

  it("reports git stderr when worktree add fails", async () => {
    mockedCheckBranch.mockResolvedValueOnce({ status: "not-found", localAhead: 0, remoteBehind: 0, diverged: false })
    mockedHasOriginRemote.mockResolvedValueOnce(false)
    mockedRunGitCommand.mockRejectedValueOnce(
      createCliError("GIT_COMMAND_FAILED", {
        message: "git worktree failed",
        details: { stderr: "fatal: '/wt' already exists\n" },
      }),
    )

    await expect(createWorktreeNew({ repo: "/repo", path: "/wt", branch: "exp/a" })).rejects.toMatchObject({
      code: "WORKTREE_CREATE_FAILED",
      message: "failed to create worktree: fatal: '/wt' already exists",
    })
  })
})

describe("createWorktreeByStrategy", () => {
  it("checks out an existing local branch", async () => {
    await createWorktreeByStrategy({ repo: "/repo", path: "/wt", branch: "feat/x", strategy: "existing" })

    expect(mockedRunGitCommand).toHaveBeenCalledWith({ cwd: "/repo", args: ["worktree", "add", "/wt", "feat/x"] })
  })

  it("tracks the remote branch", async () => {
    await createWorktreeByStrategy({ repo: "/repo", path: "/wt", branch: "feat/x", strategy: "track-remote" })

    expect(mockedRunGitCommand).toHaveBeenCalledWith({
      cwd: "/repo",
      args: ["worktree", "add", "--track", "-b", "feat/x", "/wt", "origin/feat/x"],
    })
  })
})

describe("removeWorktreeOrDirectory", () => {
  it("uses git for registered worktrees", async () => {
    mockedRunGitCommand.mockResolvedValueOnce(ok("worktree /repo\0HEAD a\0branch refs/heads/main\0\0worktree /wt\0HEAD b\0\0"))

    await expect(removeWorktreeOrDirectory("/repo", "/wt")).resolves.toEqual({ method: "git" })
    expect(mockedRunGitCommand).toHaveBeenLastCalledWith({
      cwd: "/repo",
      args: ["worktree", "remove", "/wt", "--force"],
    })
  })

  it("deletes the directory when git does not know the path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "grove-worktree-"))
    tempDirs.add(dir)
    mockedRunGitCommand.mockResolvedValueOnce(ok("worktree /repo\0HEAD a\0branch refs/heads/main\0\0"))

    await expect(removeWorktreeOrDirectory("/repo", dir)).resolves.toEqual({ method: "directory" })
    await expect(stat(dir)).rejects.toMatchObject({ code: "ENOENT" })
    expect(mockedRunGitCommand).toHaveBeenLastCalledWith({ cwd: "/repo", args: ["worktree", "prune"], reject: false })
  })
})
