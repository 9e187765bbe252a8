import { mkdir } from "node:fs/promises"
import { basename } from "node:path"
import { loadRepoOverrides, saveConfig } from "../../config/loader"
import { withLastRepo } from "../../config/registry"
import { APP_NAME, EXIT_CODE } from "../../core/constants"
import { createCliError } from "../../core/errors"
import { getOwn } from "../../core/json-storage"
import { writeWorkspaceMetadata } from "../../core/metadata"
import {
  defaultBranchName,
  experimentKey,
  extractTicket,
  validateName,
  type WorkspaceKind,
} from "../../core/names"
import { resolveChildPath } from "../../core/paths"
import { addExperiment } from "../../core/state"
import { checkBranch } from "../../git/branch"
import { createWorktreeNew } from "../../git/worktree"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"
import { resumeExperiment } from "./resume"
import {
  copyGitignoredFiles,
  launchSession,
  prepareAgentFiles,
  resolveLaunchSettings,
  resolveSourceRepo,
} from "./session"
import { loadWorkspace, saveWorkspaceState } from "./workspace"

const KIND_LABELS: Readonly<Record<WorkspaceKind, string>> = {
  experiment: "Experiment",
  feature: "Feature",
}

export const promptBranch = async (ctx: CommandContext, fallback: string): Promise<string> => {
  if (ctx.options.branch !== undefined) {
    return ctx.options.branch
  }
  const answer = await ctx.prompter.input({ message: "Branch name", default: fallback })
  return answer.length > 0 ? answer : fallback
}

/** `exp` and `feat`: a new worktree on a new branch, then a session in it. */
export const runWorkspaceCommand = async (ctx: CommandContext, kind: WorkspaceKind): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const label = KIND_LABELS[kind]
  const workspace = await loadWorkspace(ctx)

  const name = validateName(ctx.commandArgs[0] ?? (await ctx.prompter.input({ message: `${label} name` })))
  const repoPath = await resolveSourceRepo(ctx, workspace.config)
  let config = withLastRepo(workspace.config, repoPath)
  await saveConfig({ path: workspace.configPath, config })

  const repoName = basename(repoPath)
  const key = experimentKey(repoPath, name)
  const path = resolveChildPath({ rootPath: workspace.dirs.experiments, name: key })
  const branch = await promptBranch(ctx, defaultBranchName(kind, name))

  const existing = getOwn(workspace.state.experiments, key)
  if (existing !== undefined) {
    ctx.ui.warn(`${label} '${name}' already exists`)
    ctx.ui.keyValue("Path", existing.path)
    if (!(await ctx.prompter.confirm({ message: `Resume existing ${label.toLowerCase()}?`, default: false }))) {
      ctx.ui.info("Aborted")
      return EXIT_CODE.OK
    }
    return resumeExperiment(ctx, { ...workspace, config }, key, existing)
  }

  ctx.ui.header(`Creating ${label.toLowerCase()}: ${name}`)
  ctx.ui.keyValue("Repo", repoName)
  ctx.ui.keyValue("Path", path)
  ctx.ui.keyValue("Branch", branch)
  await mkdir(workspace.dirs.experiments, { recursive: true })

  ctx.ui.info("Checking branch availability...")
  const info = await checkBranch(repoPath, branch)
  if (info.status !== "not-found") {
    throw createCliError("BRANCH_ALREADY_EXISTS", {
      message: `Branch '${branch}' already exists (use: ${APP_NAME} resume ${name} -r ${repoName}, or pick a different name)`,
      details: { repo: repoPath, branch, status: info.status },
    })
  }

  ctx.ui.info("Creating worktree...")
  await createWorktreeNew({ repo: repoPath, path, branch })

  await prepareAgentFiles(ctx, { config, source: repoPath, target: path })
  const overrides = await loadRepoOverrides(repoPath)
  config = await copyGitignoredFiles(ctx, {
    configPath: workspace.configPath,
    config,
    source: repoPath,
    target: path,
    overrides,
  })

  const ticket = extractTicket(name)
  const created = ctx.now().toISOString()
  await writeWorkspaceMetadata(path, { type: kind, name, ticket, repo: repoName, created })
  await saveWorkspaceState(
    workspace,
    addExperiment(workspace.state, {
      name,
      repo: repoPath,
      path,
      branch,
      ticket,
      kind,
      created,
      lastUsed: created,
    }),
  )

  ctx.ui.success(`${label} created!`)
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config, repo: repoPath }),
    workdir: path,
    splitDirection: config.tmuxSplitDirection,
    withEditor: true,
  })
  return EXIT_CODE.OK
}
