import { rm } from "node:fs/promises"
import { resolve } from "node:path"
import { DEFAULT_REMOTE } from "../core/constants"
import { createCliError, isCliError } from "../core/errors"
import { checkBranch, fetchOrigin, getDefaultBranch, hasOriginRemote, type WorktreeStrategy } from "./branch"
import { runGitCommand } from "./exec"

export type GitWorktree = {
  readonly path: string
  readonly head: string
  readonly branch: string | null
}

export type CreateWorktreeInput = {
  readonly repo: string
  readonly path: string
  readonly branch: string
}

export type RemoveWorktreeResult = {
  readonly method: "git" | "directory"
}

const BRANCH_PREFIX = "refs/heads/"

const parseBranchName = (rawRef: string): string | null => {
  if (rawRef.startsWith(BRANCH_PREFIX)) {
    return rawRef.slice(BRANCH_PREFIX.length)
  }
  return rawRef.length > 0 ? rawRef : null
}

export const parseWorktreePorcelain = (raw: string): GitWorktree[] => {
  const worktrees: GitWorktree[] = []
  let current: { path: string; head: string; branch: string | null } | null = null

  const flush = (): void => {
    if (current !== null && current.path.length > 0) {
      worktrees.push(current)
    }
    current = null
  }

  for (const token of raw.split("\0")) {
    if (token.length === 0) {
      flush()
      continue
    }
    if (token.startsWith("worktree ")) {
      flush()
      current = { path: token.slice("worktree ".length), head: "", branch: null }
      continue
    }
    if (current === null) {
      continue
    }
    if (token.startsWith("HEAD ")) {
      current.head = token.slice("HEAD ".length)
    } else if (token.startsWith("branch ")) {
      current.branch = parseBranchName(token.slice("branch ".length))
    } else if (token === "detached") {
      current.branch = null
    }
  }

  flush()
  return worktrees
}

export const listGitWorktrees = async (repo: string): Promise<GitWorktree[]> => {
  const result = await runGitCommand({
    cwd: repo,
    args: ["worktree", "list", "--porcelain", "-z"],
  })
  return parseWorktreePorcelain(result.stdout)
}

const addWorktree = async (repo: string, args: readonly string[]): Promise<void> => {
  try {
    await runGitCommand({ cwd: repo, args: ["worktree", "add", ...args] })
  } catch (error) {
    const stderr = isCliError(error) && typeof error.details.stderr === "string" ? error.details.stderr.trim() : ""
    throw createCliError("WORKTREE_CREATE_FAILED", {
      message: stderr.length > 0 ? `failed to create worktree: ${stderr}` : "failed to create worktree",
      details: { repo, args },
      cause: error,
    })
  }
}

/**
 * Creates a worktree on a brand-new branch cut from origin's default branch,
 * or from HEAD when the repository has no origin remote.
 */
export const createWorktreeNew = async ({ repo, path, branch }: CreateWorktreeInput): Promise<void> => {
  await fetchOrigin(repo)
  const info = await checkBranch(repo, branch)
  if (info.status !== "not-found") {
    throw createCliError("BRANCH_ALREADY_EXISTS", {
      message: `branch '${branch}' already exists`,
      details: { repo, branch, status: info.status },
    })
  }
  const startPoint = (await hasOriginRemote(repo)) ? `${DEFAULT_REMOTE}/${await getDefaultBranch(repo)}` : "HEAD"
  await addWorktree(repo, ["-b", branch, path, startPoint])
}

export const createWorktreeFromBranch = async ({ repo, path, branch }: CreateWorktreeInput): Promise<void> => {
  await addWorktree(repo, [path, branch])
}

export const createWorktreeTrackRemote = async ({ repo, path, branch }: CreateWorktreeInput): Promise<void> => {
  await addWorktree(repo, ["--track", "-b", branch, path, `${DEFAULT_REMOTE}/${branch}`])
}

export const createWorktreeByStrategy = async (
  input: CreateWorktreeInput & { readonly strategy: WorktreeStrategy },
): Promise<void> => {
  switch (input.strategy) {
    case "new":
      return createWorktreeNew(input)
    case "existing":
      return createWorktreeFromBranch(input)
    case "track-remote":
      return createWorktreeTrackRemote(input)
  }
}

export const removeWorktree = async (repo: string, path: string): Promise<void> => {
  await runGitCommand({ cwd: repo, args: ["worktree", "remove", path, "--force"] })
}

/**
 * Removes a worktree through git, deleting the directory directly when git
 * does not know the path or refuses to remove it.
 */
export const removeWorktreeOrDirectory = async (repo: string, path: string): Promise<RemoveWorktreeResult> => {
  const registered = await listGitWorktrees(repo)
    .then((worktrees) => worktrees.some((worktree) => resolve(worktree.path) === resolve(path)))
    .catch(() => false)
  if (registered) {
    try {
      await removeWorktree(repo, path)
      return { method: "git" }
    } catch {
      // fall through to directory removal
    }
  }
  await rm(path, { recursive: true, force: true })
  await runGitCommand({ cwd: repo, args: ["worktree", "prune"], reject: false }).catch(() => undefined)
  return { method: "directory" }
}
