import { resolve } from "node:path"
import { createCliError } from "../core/errors"
import { readGitOutput, runGitCommand } from "./exec"

export type GitStatus = {
  readonly clean: boolean
  readonly stagedFiles: readonly string[]
  readonly modifiedFiles: readonly string[]
  readonly untrackedFiles: readonly string[]
  readonly uncommittedCount: number
}

export type StatusEntry = {
  readonly code: "A" | "M" | "?"
  readonly file: string
}

export const parseStatusPorcelain = (output: string): GitStatus => {
  const stagedFiles: string[] = []
  const modifiedFiles: string[] = []
  const untrackedFiles: string[] = []
  let uncommittedCount = 0

  for (const line of output.split("\n")) {
    if (line.length < 4) {
      continue
    }
    uncommittedCount += 1
    const index = line[0]
    const worktree = line[1]
    const file = line.slice(3)
    if (index === "?") {
      untrackedFiles.push(file)
      continue
    }
    if (index !== " ") {
      stagedFiles.push(file)
    }
    if (worktree === "M") {
      modifiedFiles.push(file)
    }
  }

  return {
    clean: uncommittedCount === 0,
    stagedFiles,
    modifiedFiles,
    untrackedFiles,
    uncommittedCount,
  }
}

/** Flattens a status into one entry per file: staged, then modified, then untracked. */
export const toStatusEntries = (status: GitStatus): StatusEntry[] => {
  return [
    ...status.stagedFiles.map((file) => ({ code: "A" as const, file })),
    ...status.modifiedFiles
      .filter((file) => status.stagedFiles.includes(file) !== true)
      .map((file) => ({ code: "M" as const, file })),
    ...status.untrackedFiles.map((file) => ({ code: "?" as const, file })),
  ]
}

export const getStatus = async (dir: string): Promise<GitStatus> => {
  const result = await runGitCommand({ cwd: dir, args: ["status", "--porcelain"] })
  return parseStatusPorcelain(result.stdout)
}

export const hasUncommittedChanges = async (dir: string): Promise<boolean> => {
  const output = await readGitOutput(dir, ["status", "--porcelain"])
  return output !== null && output.length > 0
}

export const getRecentCommits = async (dir: string, count: number): Promise<string[]> => {
  const output = await readGitOutput(dir, ["log", "--oneline", "-n", String(count)])
  if (output === null || output.length === 0) {
    return []
  }
  return output.split("\n")
}

export const isGitRepository = async (dir: string): Promise<boolean> => {
  return (await readGitOutput(dir, ["rev-parse", "--is-inside-work-tree"])) === "true"
}

export const getRepoRoot = async (dir: string): Promise<string> => {
  const output = await readGitOutput(dir, ["rev-parse", "--show-toplevel"])
  if (output === null || output.length === 0) {
    throw createCliError("NOT_GIT_REPOSITORY", {
      message: `Not a git repository: ${dir}`,
      details: { dir },
    })
  }
  return resolve(output)
}
