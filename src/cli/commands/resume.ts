import { mkdir } from "node:fs/promises"
import { basename, join } from "node:path"
import { APP_NAME, EXIT_CODE } from "../../core/constants"
import { createCliError } from "../../core/errors"
import { ensureRepositoryInitialized } from "../../core/init"
import { defaultBranchName, experimentKey, extractTicket, validateName } from "../../core/names"
import { pathExists, resolveChildPath } from "../../core/paths"
import {
  addExperiment,
  findTrackedItem,
  touchItem,
  type ExperimentRecord,
  type ProjectRecord,
  type ScratchRecord,
  type TrackedItem,
} from "../../core/state"
import { checkBranch, fetchOrigin, selectWorktreeStrategy, type BranchInfo } from "../../git/branch"
import { createWorktreeByStrategy } from "../../git/worktree"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"
import { launchSession, resolveLaunchSettings, resolveSourceRepo } from "./session"
import { loadWorkspace, pickTrackedItem, saveWorkspaceState, type Workspace } from "./workspace"

const warnDivergence = (ctx: CommandContext, info: BranchInfo): void => {
  if (info.diverged) {
    ctx.ui.warn(
      `Branch diverged from origin (${String(info.localAhead)} local, ${String(info.remoteBehind)} remote commits)`,
    )
    ctx.ui.detail("Resolve in worktree: git pull --rebase OR git merge")
    return
  }
  if (info.remoteBehind > 0) {
    ctx.ui.info(`Remote has ${String(info.remoteBehind)} new commits - consider: git pull`)
  }
}

const ensureItemPath = async (path: string, name: string): Promise<void> => {
  if (!(await pathExists(path))) {
    throw createCliError("PATH_NOT_FOUND", {
      message: `Path no longer exists: ${path} (run: ${APP_NAME} cleanup ${name})`,
      details: { path, name },
    })
  }
}

export const resumeExperiment = async (
  ctx: CommandContext,
  workspace: Workspace,
  key: string,
  record: ExperimentRecord,
): Promise<number> => {
  await ensureItemPath(record.path, record.name)

  await fetchOrigin(record.repo)
  warnDivergence(ctx, await checkBranch(record.repo, record.branch))

  await saveWorkspaceState(workspace, touchItem(workspace.state, "experiment", key, ctx.now()))

  ctx.ui.header(`Resuming: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config: workspace.config, repo: record.repo }),
    workdir: record.path,
    splitDirection: workspace.config.tmuxSplitDirection,
    withEditor: false,
  })
  return EXIT_CODE.OK
}

/** Agent session for a project: runs in the first repository and sees the others via extra dirs. */
export const launchProjectSession = async (
  ctx: CommandContext,
  workspace: Workspace,
  record: ProjectRecord,
  { withEditor }: { readonly withEditor: boolean },
): Promise<void> => {
  const [primary, ...others] = record.repos
  if (primary === undefined) {
    throw createCliError("INVALID_STATE", {
      message: `Project '${record.name}' has no repositories`,
      details: { project: record.name },
    })
  }
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config: workspace.config, repo: primary.source }),
    workdir: join(record.path, primary.name),
    editorDir: record.path,
    extraDirs: others.map((repo) => join(record.path, repo.name)),
    splitDirection: workspace.config.tmuxSplitDirection,
    withEditor,
  })
}

export const resumeProject = async (ctx: CommandContext, workspace: Workspace, record: ProjectRecord): Promise<number> => {
  await ensureItemPath(record.path, record.name)

  for (const repo of record.repos) {
    await fetchOrigin(repo.source)
    const info = await checkBranch(repo.source, record.branch)
    if (info.diverged) {
      ctx.ui.warn(
        `${repo.name}: branch diverged (${String(info.localAhead)} local, ${String(info.remoteBehind)} remote)`,
      )
    }
  }

  await saveWorkspaceState(workspace, touchItem(workspace.state, "project", record.name, ctx.now()))

  ctx.ui.header(`Resuming: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)
  await launchProjectSession(ctx, workspace, record, { withEditor: false })
  return EXIT_CODE.OK
}

export const resumeScratch = async (ctx: CommandContext, workspace: Workspace, record: ScratchRecord): Promise<number> => {
  await ensureItemPath(record.path, record.name)

  await saveWorkspaceState(workspace, touchItem(workspace.state, "scratch", record.name, ctx.now()))

  ctx.ui.header(`Resuming: ${record.name}`)
  ctx.ui.keyValue("Path", record.path)
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config: workspace.config, repo: null }),
    workdir: record.path,
    splitDirection: workspace.config.tmuxSplitDirection,
    withEditor: false,
  })
  return EXIT_CODE.OK
}

export const resumeItem = async (ctx: CommandContext, workspace: Workspace, item: TrackedItem): Promise<number> => {
  switch (item.type) {
    case "experiment":
      return resumeExperiment(ctx, workspace, item.key, item.record)
    case "project":
      return resumeProject(ctx, workspace, item.record)
    case "scratch":
      return resumeScratch(ctx, workspace, item.record)
  }
}

/** Turns an existing `exp/<name>` branch that grove does not track into an experiment. */
const adoptBranch = async (ctx: CommandContext, workspace: Workspace, name: string): Promise<number> => {
  validateName(name)
  const repoPath = await resolveSourceRepo(ctx, workspace.config)
  const branch = defaultBranchName("experiment", name)

  ctx.ui.info(`Checking for branch '${branch}' in ${basename(repoPath)}...`)
  await fetchOrigin(repoPath)
  const info = await checkBranch(repoPath, branch)
  if (info.status === "not-found") {
    throw createCliError("BRANCH_NOT_FOUND", {
      message: `Branch '${branch}' not found locally or on remote (create it with: ${APP_NAME} exp ${name})`,
      details: { repo: repoPath, branch },
    })
  }

  const key = experimentKey(repoPath, name)
  const path = resolveChildPath({ rootPath: workspace.dirs.experiments, name: key })
  await mkdir(workspace.dirs.experiments, { recursive: true })

  const strategy = selectWorktreeStrategy(info.status)
  ctx.ui.info(strategy === "track-remote" ? `Tracking remote branch 'origin/${branch}'` : `Adopting branch '${branch}'`)
  await createWorktreeByStrategy({ repo: repoPath, path, branch, strategy })
  warnDivergence(ctx, info)

  if (workspace.config.autoInit) {
    await ensureRepositoryInitialized(path)
  }

  const now = ctx.now().toISOString()
  const state = addExperiment(workspace.state, {
    name,
    repo: repoPath,
    path,
    branch,
    ticket: extractTicket(name),
    kind: "experiment",
    created: now,
    lastUsed: now,
  })
  await saveWorkspaceState(workspace, state)

  ctx.ui.success(`Adopted experiment '${name}'`)
  ctx.ui.keyValue("Path", path)
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config: workspace.config, repo: repoPath }),
    workdir: path,
    splitDirection: workspace.config.tmuxSplitDirection,
    withEditor: false,
  })
  return EXIT_CODE.OK
}

export const runResumeCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const workspace = await loadWorkspace(ctx)
  const name = ctx.commandArgs[0]

  if (name === undefined) {
    const item = await pickTrackedItem(ctx, workspace.state, { message: "Select to resume" })
    if (item === null) {
      ctx.ui.info("No experiments, projects, or scratch folders to resume")
      ctx.ui.detail(`Create one with: ${APP_NAME} exp <name>`)
      ctx.ui.detail(`Or for no-git: ${APP_NAME} scratch <name>`)
      ctx.ui.detail(`Or adopt an existing branch: ${APP_NAME} resume <name> -r <repo>`)
      return EXIT_CODE.OK
    }
    return resumeItem(ctx, workspace, item)
  }

  const item = findTrackedItem(workspace.state, name)
  if (item !== undefined) {
    return resumeItem(ctx, workspace, item)
  }
  return adoptBranch(ctx, workspace, name)
}
