import { beforeEach, describe, expect, it, vi } from "vitest"

vi.mock("./exec", () => {
  return {
    runGitCommand: vi.fn(),
    readGitOutput: vi.fn(),
    doesGitRefExist: vi.fn(),
  }
})

import {
  checkBranch,
  classifyBranch,
  describeBranchInfo,
  getDefaultBranch,
  isDiverged,
  parseDivergenceCounts,
  preflightCheck,
  selectWorktreeStrategy,
  type BranchInfo,
} from "./branch"
import { doesGitRefExist, readGitOutput } from "./exec"

const mockedReadGitOutput = vi.mocked(readGitOutput)
const mockedDoesGitRefExist = vi.mocked(doesGitRefExist)

const useFakeGit = ({
  refs = [],
  outputs = {},
}: {
  readonly refs?: readonly string[]
  readonly outputs?: Readonly<Record<string, string>>
}): void => {
  mockedDoesGitRefExist.mockImplementation(async (_cwd, ref) => refs.includes(ref))
  mockedReadGitOutput.mockImplementation(async (_cwd, args) => outputs[args.join(" ")] ?? null)
}

beforeEach(() => {
  mockedReadGitOutput.mockReset()
  mockedDoesGitRefExist.mockReset()
})

describe("classifyBranch", () => {
  it("maps existence flags to the four states", () => {
    expect(classifyBranch(false, false)).toBe("not-found")
    expect(classifyBranch(true, false)).toBe("local-only")
    expect(classifyBranch(false, true)).toBe("remote-only")
    expect(classifyBranch(true, true)).toBe("both")
  })
})

describe("isDiverged", () => {
  it("is true only when both counts are positive", () => {
    expect(isDiverged(1, 1)).toBe(true)
    expect(isDiverged(3, 0)).toBe(false)
    expect(isDiverged(0, 2)).toBe(false)
    expect(isDiverged(0, 0)).toBe(false)
  })
})

describe("parseDivergenceCounts", () => {
  it("reads tab separated counts", () => {
    expect(parseDivergenceCounts("2\t5\n")).toEqual({ localAhead: 2, remoteBehind: 5 })
  })

  it("falls back to zero counts on unexpected output", () => {
    expect(parseDivergenceCounts("")).toEqual({ localAhead: 0, remoteBehind: 0 })
    expect(parseDivergenceCounts("x\ty")).toEqual({ localAhead: 0, remoteBehind: 0 })
    expect(parseDivergenceCounts("1 2 3")).toEqual({ localAhead: 0, remoteBehind: 0 })
  })
})

describe("selectWorktreeStrategy", () => {
  it("follows the create/adopt decision table", () => {
    expect(selectWorktreeStrategy("not-found")).toBe("new")
    expect(selectWorktreeStrategy("local-only")).toBe("existing")
    expect(selectWorktreeStrategy("both")).toBe("existing")
    expect(selectWorktreeStrategy("remote-only")).toBe("track-remote")
  })
})

describe("checkBranch", () => {
  it("reports not-found when neither side has the branch", async () => {
    useFakeGit({})

    await expect(checkBranch("/repo", "exp/a")).resolves.toEqual({
      status: "not-found",
      localAhead: 0,
      remoteBehind: 0,
      diverged: false,
    })
  })

  it("reports local-only without querying divergence", async () => {
    useFakeGit({ refs: ["refs/heads/exp/a"] })

    const info = await checkBranch("/repo", "exp/a")

    expect(info.status).toBe("local-only")
    expect(mockedReadGitOutput).not.toHaveBeenCalledWith("/repo", [
      "rev-list",
      "--left-right",
      "--count",
      "exp/a...origin/exp/a",
    ])
  })

  it("reports remote-only from ls-remote output", async () => {
    useFakeGit({
      outputs: { "ls-remote --heads origin exp/a": "abc123\trefs/heads/exp/a" },
    })

    await expect(checkBranch("/repo", "exp/a")).resolves.toMatchObject({ status: "remote-only" })
  })

  it("computes divergence when both sides exist", async () => {
    useFakeGit({
      refs: ["refs/heads/exp/a"],
      outputs: {
        "ls-remote --heads origin exp/a": "abc123\trefs/heads/exp/a",
        "rev-list --left-right --count exp/a...origin/exp/a": "2\t3",
      },
    })

    await expect(checkBranch("/repo", "exp/a")).resolves.toEqual({
      status: "both",
      localAhead: 2,
      remoteBehind: 3,
      diverged: true,
    })
  })

  it("treats a failing divergence query as in sync", async () => {
    useFakeGit({
      refs: ["refs/heads/exp/a"],
      outputs: { "ls-remote --heads origin exp/a": "abc123\trefs/heads/exp/a" },
    })

    await expect(checkBranch("/repo", "exp/a")).resolves.toEqual({
      status: "both",
      localAhead: 0,
      remoteBehind: 0,
      diverged: false,
    })
  })
})

describe("preflightCheck", () => {
  it("fetches and checks each repo in order", async () => {
    useFakeGit({ refs: ["refs/heads/feat/x"] })

    const results = await preflightCheck(["/a", "/b"], "feat/x")

    expect(results.map((result) => result.repo)).toEqual(["/a", "/b"])
    expect(results.map((result) => result.info.status)).toEqual(["local-only", "local-only"])
    expect(mockedReadGitOutput).toHaveBeenCalledWith("/a", ["fetch", "origin"])
    expect(mockedReadGitOutput).toHaveBeenCalledWith("/b", ["fetch", "origin"])
  })
})

describe("getDefaultBranch", () => {
  it("uses the last segment of origin/HEAD", async () => {
    useFakeGit({ outputs: { "symbolic-ref refs/remotes/origin/HEAD": "refs/remotes/origin/trunk" } })

    await expect(getDefaultBranch("/repo")).resolves.toBe("trunk")
  })

  it("falls back to main, then master", async () => {
    useFakeGit({ refs: ["refs/remotes/origin/main"] })
    await expect(getDefaultBranch("/repo")).resolves.toBe("main")

    useFakeGit({})
    await expect(getDefaultBranch("/repo")).resolves.toBe("master")
  })
})

describe("describeBranchInfo", () => {
  const both = (localAhead: number, remoteBehind: number): BranchInfo => ({
    status: "both",
    localAhead,
    remoteBehind,
    diverged: isDiverged(localAhead, remoteBehind),
  })

  it("summarizes each state", () => {
    expect(describeBranchInfo({ status: "not-found", localAhead: 0, remoteBehind: 0, diverged: false })).toEqual({
      level: "success",
      message: "will create new branch",
    })
    expect(describeBranchInfo(both(1, 2))).toEqual({
      level: "warn",
      message: "exists, diverged (1 local, 2 remote commits)",
    })
    expect(describeBranchInfo(both(0, 4))).toEqual({ level: "warn", message: "exists, 4 commits behind remote" })
    expect(describeBranchInfo(both(5, 0))).toEqual({ level: "info", message: "exists, 5 commits ahead of remote" })
    expect(describeBranchInfo(both(0, 0))).toEqual({ level: "info", message: "exists, in sync with remote" })
  })
})
