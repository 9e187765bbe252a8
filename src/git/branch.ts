import { DEFAULT_REMOTE } from "../core/constants"
import { doesGitRefExist, readGitOutput, runGitCommand } from "./exec"

export type BranchStatus = "not-found" | "local-only" | "remote-only" | "both"

export type BranchInfo = {
  readonly status: BranchStatus
  readonly localAhead: number
  readonly remoteBehind: number
  readonly diverged: boolean
}

export type WorktreeStrategy = "new" | "existing" | "track-remote"

export type PreflightResult = {
  readonly repo: string
  readonly info: BranchInfo
}

export type BranchInfoSummary = {
  readonly level: "success" | "info" | "warn"
  readonly message: string
}

const EMPTY_COUNTS = { localAhead: 0, remoteBehind: 0 } as const

export const classifyBranch = (localExists: boolean, remoteExists: boolean): BranchStatus => {
  if (localExists && remoteExists) {
    return "both"
  }
  if (localExists) {
    return "local-only"
  }
  if (remoteExists) {
    return "remote-only"
  }
  return "not-found"
}

export const isDiverged = (localAhead: number, remoteBehind: number): boolean => {
  return localAhead > 0 && remoteBehind > 0
}

export const parseDivergenceCounts = (
  output: string,
): { readonly localAhead: number; readonly remoteBehind: number } => {
  const parts = output.trim().split(/\s+/)
  if (parts.length !== 2) {
    return EMPTY_COUNTS
  }
  const [left, right] = parts.map((part) => Number.parseInt(part, 10))
  if (left === undefined || right === undefined || Number.isNaN(left) || Number.isNaN(right)) {
    return EMPTY_COUNTS
  }
  return { localAhead: left, remoteBehind: right }
}

export const selectWorktreeStrategy = (status: BranchStatus): WorktreeStrategy => {
  switch (status) {
    case "not-found":
      return "new"
    case "local-only":
    case "both":
      return "existing"
    case "remote-only":
      return "track-remote"
  }
}

const branchExistsLocally = async (repo: string, branch: string): Promise<boolean> => {
  return doesGitRefExist(repo, `refs/heads/${branch}`)
}

const branchExistsOnRemote = async (repo: string, branch: string): Promise<boolean> => {
  const output = await readGitOutput(repo, ["ls-remote", "--heads", DEFAULT_REMOTE, branch])
  return output !== null && output.length > 0
}

const readDivergence = async (
  repo: string,
  branch: string,
): Promise<{ readonly localAhead: number; readonly remoteBehind: number }> => {
  const output = await readGitOutput(repo, [
    "rev-list",
    "--left-right",
    "--count",
    `${branch}...${DEFAULT_REMOTE}/${branch}`,
  ])
  return output === null ? EMPTY_COUNTS : parseDivergenceCounts(output)
}

export const checkBranch = async (repo: string, branch: string): Promise<BranchInfo> => {
  const localExists = await branchExistsLocally(repo, branch)
  const remoteExists = await branchExistsOnRemote(repo, branch)
  const status = classifyBranch(localExists, remoteExists)
  if (status !== "both") {
    return { status, ...EMPTY_COUNTS, diverged: false }
  }
  const counts = await readDivergence(repo, branch)
  return {
    status,
    ...counts,
    diverged: isDiverged(counts.localAhead, counts.remoteBehind),
  }
}

/** Fetches from origin; failures (offline, no remote) are ignored. */
export const fetchOrigin = async (repo: string): Promise<void> => {
  await readGitOutput(repo, ["fetch", DEFAULT_REMOTE])
}

export const preflightCheck = async (repos: readonly string[], branch: string): Promise<PreflightResult[]> => {
  const results: PreflightResult[] = []
  for (const repo of repos) {
    await fetchOrigin(repo)
    results.push({ repo, info: await checkBranch(repo, branch) })
  }
  return results
}

export const hasOriginRemote = async (repo: string): Promise<boolean> => {
  return (await readGitOutput(repo, ["remote", "get-url", DEFAULT_REMOTE])) !== null
}

export const getDefaultBranch = async (repo: string): Promise<string> => {
  const symbolic = await readGitOutput(repo, ["symbolic-ref", `refs/remotes/${DEFAULT_REMOTE}/HEAD`])
  if (symbolic !== null && symbolic.length > 0) {
    const segments = symbolic.split("/")
    const last = segments[segments.length - 1]
    if (last !== undefined && last.length > 0) {
      return last
    }
  }
  if (await doesGitRefExist(repo, `refs/remotes/${DEFAULT_REMOTE}/main`)) {
    return "main"
  }
  return "master"
}

export const getCurrentBranch = async (dir: string): Promise<string | null> => {
  return readGitOutput(dir, ["rev-parse", "--abbrev-ref", "HEAD"])
}

export const deleteBranch = async (repo: string, branch: string): Promise<void> => {
  await runGitCommand({ cwd: repo, args: ["branch", "-D", branch] })
}

export const describeBranchInfo = (info: BranchInfo): BranchInfoSummary => {
  switch (info.status) {
    case "not-found":
      return { level: "success", message: "will create new branch" }
    case "local-only":
      return { level: "warn", message: "local branch exists (will use existing)" }
    case "remote-only":
      return { level: "info", message: "will track remote branch" }
    case "both":
      if (info.diverged) {
        return {
          level: "warn",
          message: `exists, diverged (${String(info.localAhead)} local, ${String(info.remoteBehind)} remote commits)`,
        }
      }
      if (info.remoteBehind > 0) {
        return { level: "warn", message: `exists, ${String(info.remoteBehind)} commits behind remote` }
      }
      if (info.localAhead > 0) {
        return { level: "info", message: `exists, ${String(info.localAhead)} commits ahead of remote` }
      }
      return { level: "info", message: "exists, in sync with remote" }
  }
}
