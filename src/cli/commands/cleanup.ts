import { readdir, rm } from "node:fs/promises"
import { basename, join } from "node:path"
import { EXIT_CODE } from "../../core/constants"
import { createCliError, ensureCliError } from "../../core/errors"
import { pathExists } from "../../core/paths"
import {
  findTrackedItem,
  removeItem,
  type ExperimentRecord,
  type ProjectRecord,
  type ScratchRecord,
  type TrackedItem,
} from "../../core/state"
import { deleteBranch } from "../../git/branch"
import { hasUncommittedChanges, isGitRepository } from "../../git/status"
import { removeWorktreeOrDirectory } from "../../git/worktree"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"
import { loadWorkspace, pickTrackedItem, saveWorkspaceState, type Workspace } from "./workspace"

const CANCELLED_MESSAGE = "Cleanup cancelled"

/** Asks before a destructive step; `--force` answers yes. */
const confirmUnlessForced = async (ctx: CommandContext, message: string): Promise<boolean> => {
  if (ctx.options.force) {
    return true
  }
  return ctx.prompter.confirm({ message, default: false })
}

const isDirty = async (path: string): Promise<boolean> => {
  if (!(await pathExists(path)) || !(await isGitRepository(path))) {
    return false
  }
  return hasUncommittedChanges(path)
}

const deleteBranchOrWarn = async (ctx: CommandContext, repo: string, branch: string, label?: string): Promise<void> => {
  try {
    await deleteBranch(repo, branch)
    ctx.ui.success(label === undefined ? `Deleted branch ${branch}` : `${label}: deleted branch ${branch}`)
  } catch (error) {
    const prefix = label === undefined ? "" : `${label}: `
    ctx.ui.warn(`${prefix}could not delete branch ${branch}: ${ensureCliError(error).message}`)
  }
}

const cleanupExperiment = async (ctx: CommandContext, record: ExperimentRecord): Promise<boolean> => {
  ctx.ui.header(`Experiment: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)
  ctx.ui.keyValue("Branch", record.branch)

  if (await isDirty(record.path)) {
    ctx.ui.warn("Uncommitted changes detected")
    if (!(await confirmUnlessForced(ctx, "Discard changes and continue?"))) {
      ctx.ui.info(CANCELLED_MESSAGE)
      return false
    }
  }

  ctx.ui.info("Removing worktree...")
  await removeWorktreeOrDirectory(record.repo, record.path)
  ctx.ui.success("Worktree removed")

  if (await confirmUnlessForced(ctx, `Delete branch ${record.branch}?`)) {
    await deleteBranchOrWarn(ctx, record.repo, record.branch)
  }
  return true
}

const cleanupProject = async (ctx: CommandContext, record: ProjectRecord): Promise<boolean> => {
  ctx.ui.header(`Project: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)
  ctx.ui.keyValue("Branch", record.branch)
  ctx.ui.keyValue("Repos", record.repos.map((repo) => repo.name).join(", "))

  const dirty: string[] = []
  for (const repo of record.repos) {
    if (await isDirty(join(record.path, repo.name))) {
      dirty.push(repo.name)
    }
  }
  if (dirty.length > 0) {
    ctx.ui.warn(`Uncommitted changes in: ${dirty.join(", ")}`)
    if (!(await confirmUnlessForced(ctx, "Discard changes and continue?"))) {
      ctx.ui.info(CANCELLED_MESSAGE)
      return false
    }
  }

  for (const repo of record.repos) {
    ctx.ui.info(`Removing ${repo.name}...`)
    await removeWorktreeOrDirectory(repo.source, join(record.path, repo.name))
  }
  await rm(record.path, { recursive: true, force: true })
  ctx.ui.success("Worktrees removed")

  if (await confirmUnlessForced(ctx, `Delete branch ${record.branch} from all repos?`)) {
    for (const repo of record.repos) {
      await deleteBranchOrWarn(ctx, repo.source, record.branch, repo.name)
    }
  }
  return true
}

const countVisibleEntries = async (path: string): Promise<number> => {
  const entries = await readdir(path).catch((): string[] => [])
  return entries.filter((entry) => !entry.startsWith(".")).length
}

const cleanupScratch = async (ctx: CommandContext, record: ScratchRecord): Promise<boolean> => {
  ctx.ui.header(`Scratch: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)

  const count = await countVisibleEntries(record.path)
  if (count > 0 && !ctx.options.force) {
    ctx.ui.warn(`Scratch folder contains ${String(count)} file(s)`)
    if (!(await ctx.prompter.confirm({ message: "Delete all contents and continue?", default: false }))) {
      ctx.ui.info(CANCELLED_MESSAGE)
      return false
    }
  }

  await rm(record.path, { recursive: true, force: true })
  ctx.ui.success("Folder removed")
  return true
}

const cleanupItem = async (ctx: CommandContext, workspace: Workspace, item: TrackedItem): Promise<number> => {
  let removed: boolean
  switch (item.type) {
    case "experiment":
      removed = await cleanupExperiment(ctx, item.record)
      break
    case "project":
      removed = await cleanupProject(ctx, item.record)
      break
    case "scratch":
      removed = await cleanupScratch(ctx, item.record)
      break
  }
  if (!removed) {
    return EXIT_CODE.OK
  }

  await saveWorkspaceState(workspace, removeItem(workspace.state, item))
  ctx.ui.success(`Cleaned up ${item.type} '${item.record.name}'`)
  if (item.type === "experiment") {
    ctx.logger.debug(`removed ${item.key} from ${basename(item.record.repo)}`)
  }
  return EXIT_CODE.OK
}

export const runCleanupCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const workspace = await loadWorkspace(ctx)
  const name = ctx.commandArgs[0]

  if (name === undefined) {
    const item = await pickTrackedItem(ctx, workspace.state, { message: "Select to clean up" })
    if (item === null) {
      ctx.ui.info("No experiments, projects, or scratch folders to clean up")
      return EXIT_CODE.OK
    }
    return cleanupItem(ctx, workspace, item)
  }

  const item = findTrackedItem(workspace.state, name)
  if (item === undefined) {
    throw createCliError("NOT_FOUND", {
      message: `'${name}' not found as experiment, project, or scratch`,
      details: { name },
    })
  }
  return cleanupItem(ctx, workspace, item)
}
