import { mkdir, rm } from "node:fs/promises"
import { basename, join, resolve } from "node:path"
import { expandHomePath, loadRepoOverrides } from "../../config/loader"
import { listRegisteredRepos } from "../../config/registry"
import type { GroveConfig } from "../../config/types"
import { APP_NAME, EXIT_CODE } from "../../core/constants"
import { createCliError, ensureCliError } from "../../core/errors"
import { getOwn } from "../../core/json-storage"
import { writeProjectMetadata } from "../../core/metadata"
import { defaultBranchName, validateName } from "../../core/names"
import { resolveChildPath } from "../../core/paths"
import { addProject, type ProjectRecord, type ProjectRepo } from "../../core/state"
import {
  describeBranchInfo,
  preflightCheck,
  selectWorktreeStrategy,
  type BranchInfo,
  type PreflightResult,
} from "../../git/branch"
import { createWorktreeByStrategy, removeWorktreeOrDirectory } from "../../git/worktree"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"
import { promptBranch } from "./experiment"
import { launchProjectSession } from "./resume"
import { copyGitignoredFiles, prepareAgentFiles, resolveRepoInput } from "./session"
import { loadWorkspace, saveWorkspaceState, type Workspace } from "./workspace"

type PlannedRepo = {
  readonly source: string
  readonly folder: string
}

const addPlannedRepo = (planned: readonly PlannedRepo[], candidate: PlannedRepo): PlannedRepo[] => {
  validateName(candidate.folder)
  if (planned.some((repo) => repo.source === candidate.source)) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Repo already added: ${candidate.source}`,
      details: { source: candidate.source },
    })
  }
  if (planned.some((repo) => repo.folder === candidate.folder)) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Folder name already used: ${candidate.folder}`,
      details: { folder: candidate.folder },
    })
  }
  return [...planned, candidate]
}

/** Repositories from repeated `-r`, or prompted one at a time until a blank answer. */
const collectProjectRepos = async (ctx: CommandContext, config: GroveConfig): Promise<PlannedRepo[]> => {
  let planned: PlannedRepo[] = []

  if (ctx.options.repos.length > 0) {
    for (const value of ctx.options.repos) {
      const source = await resolveRepoInput(ctx, config, value)
      planned = addPlannedRepo(planned, { source, folder: basename(source) })
    }
    return planned
  }

  ctx.ui.header("Add repositories")
  ctx.ui.detail("Enter repo path or registered name (blank when done)")
  const registered = listRegisteredRepos(config)
  if (registered.length > 0) {
    ctx.ui.detail(`Registered repos: ${registered.map((repo) => repo.name).join(", ")}`)
  }

  for (;;) {
    const value = await ctx.prompter.input({ message: "Repo", default: "" })
    if (value.length === 0) {
      return planned
    }
    try {
      const source = await resolveRepoInput(ctx, config, value)
      const folderAnswer = await ctx.prompter.input({ message: "Folder name", default: basename(source) })
      const folder = folderAnswer.length > 0 ? folderAnswer : basename(source)
      planned = addPlannedRepo(planned, { source, folder })
      ctx.ui.success(`Added ${basename(source)} -> ${folder}`)
    } catch (error) {
      const cliError = ensureCliError(error)
      if (cliError.code === "CANCELLED" || cliError.code === "INTERACTIVE_REQUIRED") {
        throw cliError
      }
      ctx.ui.error(cliError.message)
    }
  }
}

/** Prints one preflight line per repository; returns true when any line is a warning. */
const reportPreflight = (
  ctx: CommandContext,
  entries: ReadonlyArray<{ readonly label: string; readonly info: BranchInfo }>,
): boolean => {
  let hasWarnings = false
  for (const { label, info } of entries) {
    const summary = describeBranchInfo(info)
    ctx.ui[summary.level](`${label}: ${summary.message}`)
    hasWarnings = hasWarnings || summary.level === "warn"
  }
  return hasWarnings
}

const confirmOrAbort = async (ctx: CommandContext, message: string): Promise<boolean> => {
  if (ctx.options.yes) {
    return true
  }
  return ctx.prompter.confirm({ message, default: false })
}

const rollbackProject = async (projectPath: string, created: readonly ProjectRepo[]): Promise<void> => {
  for (const repo of created) {
    await removeWorktreeOrDirectory(repo.source, join(projectPath, repo.name))
  }
  await rm(projectPath, { recursive: true, force: true })
}

/** Creates one worktree of the project and prepares it like a standalone workspace. */
const createProjectRepo = async (
  ctx: CommandContext,
  {
    workspace,
    config,
    projectPath,
    branch,
    repo,
    info,
  }: {
    readonly workspace: Workspace
    readonly config: GroveConfig
    readonly projectPath: string
    readonly branch: string
    readonly repo: PlannedRepo
    readonly info: BranchInfo
  },
): Promise<GroveConfig> => {
  const worktreePath = resolveChildPath({ rootPath: projectPath, name: repo.folder })
  ctx.ui.info(`Creating ${repo.folder}...`)
  await createWorktreeByStrategy({
    repo: repo.source,
    path: worktreePath,
    branch,
    strategy: selectWorktreeStrategy(info.status),
  })
  await prepareAgentFiles(ctx, { config, source: null, target: worktreePath })
  return copyGitignoredFiles(ctx, {
    configPath: workspace.configPath,
    config,
    source: repo.source,
    target: worktreePath,
    overrides: await loadRepoOverrides(repo.source),
  })
}

const findPreflight = (results: readonly PreflightResult[], source: string): BranchInfo => {
  const result = results.find((entry) => entry.repo === source)
  if (result === undefined) {
    throw createCliError("INTERNAL_ERROR", { message: `Missing branch check for ${source}`, details: { source } })
  }
  return result.info
}

const runProjectCreate = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const workspace = await loadWorkspace(ctx)
  const name = validateName(ctx.commandArgs[0] ?? (await ctx.prompter.input({ message: "Project name" })))

  const existing = getOwn(workspace.state.projects, name)
  if (existing !== undefined) {
    throw createCliError("ALREADY_EXISTS", {
      message: `Project '${name}' already exists (use: ${APP_NAME} resume ${name})`,
      details: { name, path: existing.path },
    })
  }
  const projectPath = resolveChildPath({ rootPath: workspace.dirs.projects, name })

  const branch = await promptBranch(ctx, defaultBranchName("feature", name))
  const repos = await collectProjectRepos(ctx, workspace.config)
  if (repos.length === 0) {
    throw createCliError("INVALID_ARGUMENT", { message: "No repositories added" })
  }
  if (repos.length < 2) {
    ctx.ui.warn(`Only one repo added. Consider using '${APP_NAME} exp' for single-repo work.`)
    if (!(await confirmOrAbort(ctx, "Continue anyway?"))) {
      ctx.ui.info("Aborted")
      return EXIT_CODE.OK
    }
  }

  ctx.ui.info("Checking branches...")
  const results = await preflightCheck(
    repos.map((repo) => repo.source),
    branch,
  )
  const hasWarnings = reportPreflight(
    ctx,
    repos.map((repo) => ({ label: repo.folder, info: findPreflight(results, repo.source) })),
  )
  if (hasWarnings && !(await confirmOrAbort(ctx, "Warnings detected. Proceed anyway?"))) {
    ctx.ui.info("Aborted")
    return EXIT_CODE.OK
  }

  ctx.ui.header(`Creating project: ${name}`)
  ctx.ui.keyValue("Path", projectPath)
  ctx.ui.keyValue("Branch", branch)
  await mkdir(projectPath, { recursive: true })

  let config = workspace.config
  const created: ProjectRepo[] = []
  for (const repo of repos) {
    try {
      config = await createProjectRepo(ctx, {
        workspace,
        config,
        projectPath,
        branch,
        repo,
        info: findPreflight(results, repo.source),
      })
    } catch (error) {
      ctx.ui.error(`Failed to create worktree for ${repo.folder}`)
      ctx.ui.warn("Cleaning up partial project...")
      await rollbackProject(projectPath, [...created, { name: repo.folder, source: repo.source }])
      throw error
    }
    created.push({ name: repo.folder, source: repo.source })
    ctx.ui.success(`Created ${repo.folder}`)
  }

  const now = ctx.now().toISOString()
  const record: ProjectRecord = { name, path: projectPath, branch, repos: created, created: now, lastUsed: now }
  await writeProjectMetadata(projectPath, { name, branch, repos: created, created: now })
  const next = await saveWorkspaceState({ ...workspace, config }, addProject(workspace.state, record))

  ctx.ui.success("Project created!")
  await launchProjectSession(ctx, next, record, { withEditor: true })
  return EXIT_CODE.OK
}

const pickProject = async (ctx: CommandContext, workspace: Workspace): Promise<string> => {
  const names = Object.keys(workspace.state.projects).sort()
  const [only] = names
  if (names.length === 1 && only !== undefined) {
    return only
  }
  return ctx.prompter.select<string>({
    message: "Select project",
    choices: names.map((name) => ({ name, value: name })),
  })
}

const pickRepoToAdd = async (ctx: CommandContext, config: GroveConfig, record: ProjectRecord): Promise<string> => {
  const registered = listRegisteredRepos(config)
  if (registered.length === 0) {
    throw createCliError("NO_REPOSITORIES", {
      message: `No registered repos. Add some with: ${APP_NAME} repo add <path>`,
    })
  }
  const inProject = new Set(record.repos.map((repo) => resolve(repo.source)))
  const available = registered
    .map((repo) => ({ name: repo.name, path: resolve(expandHomePath(repo.path, ctx.home)) }))
    .filter((repo) => !inProject.has(repo.path))
  if (available.length === 0) {
    throw createCliError("INVALID_ARGUMENT", { message: "All registered repos are already in this project" })
  }
  return ctx.prompter.select<string>({
    message: "Select repo to add",
    choices: available.map((repo) => ({ name: `${repo.name} (${repo.path})`, value: repo.path })),
  })
}

/** `project add [project] [repo]`: one more repository on the project's branch. */
const runProjectAdd = async (ctx: CommandContext, args: readonly string[]): Promise<number> => {
  ensureArgumentCount({ command: "project add", args, min: 0, max: 2 })
  const workspace = await loadWorkspace(ctx)
  if (Object.keys(workspace.state.projects).length === 0) {
    throw createCliError("NOT_FOUND", {
      message: `No projects found. Create one first with: ${APP_NAME} project <name>`,
    })
  }

  const projectName = args[0] ?? (await pickProject(ctx, workspace))
  const record = getOwn(workspace.state.projects, projectName)
  if (record === undefined) {
    throw createCliError("NOT_FOUND", {
      message: `Project '${projectName}' not found`,
      details: { name: projectName },
    })
  }

  const repoInput = args[1] ?? ctx.options.repos[0]
  const source =
    repoInput === undefined
      ? await pickRepoToAdd(ctx, workspace.config, record)
      : await resolveRepoInput(ctx, workspace.config, repoInput)
  if (record.repos.some((repo) => resolve(repo.source) === source)) {
    throw createCliError("ALREADY_EXISTS", {
      message: `Repo '${basename(source)}' is already in project '${projectName}'`,
      details: { project: projectName, source },
    })
  }

  const folderAnswer = await ctx.prompter.input({ message: "Folder name", default: basename(source) })
  const folder = validateName(folderAnswer.length > 0 ? folderAnswer : basename(source))
  if (record.repos.some((repo) => repo.name === folder)) {
    throw createCliError("ALREADY_EXISTS", {
      message: `Folder name '${folder}' already exists in project`,
      details: { project: projectName, folder },
    })
  }

  ctx.ui.info(`Checking branch '${record.branch}'...`)
  const results = await preflightCheck([source], record.branch)
  const info = findPreflight(results, source)
  reportPreflight(ctx, [{ label: folder, info }])

  ctx.ui.header(`Adding to project: ${projectName}`)
  ctx.ui.keyValue("Repo", basename(source))
  ctx.ui.keyValue("Folder", folder)
  ctx.ui.keyValue("Branch", record.branch)

  const config = await createProjectRepo(ctx, {
    workspace,
    config: workspace.config,
    projectPath: record.path,
    branch: record.branch,
    repo: { source, folder },
    info,
  })

  const updated: ProjectRecord = {
    ...record,
    repos: [...record.repos, { name: folder, source }],
    lastUsed: ctx.now().toISOString(),
  }
  const next = await saveWorkspaceState({ ...workspace, config }, addProject(workspace.state, updated))
  await writeProjectMetadata(record.path, {
    name: updated.name,
    branch: updated.branch,
    repos: updated.repos,
    created: updated.created,
  })

  ctx.ui.success(`Added ${folder} to project!`)
  if (await ctx.prompter.confirm({ message: "Launch agent?", default: true })) {
    await launchProjectSession(ctx, next, updated, { withEditor: true })
  }
  return EXIT_CODE.OK
}

export const runProjectCommand = async (ctx: CommandContext): Promise<number> => {
  if (ctx.commandArgs[0] === "add") {
    return runProjectAdd(ctx, ctx.commandArgs.slice(1))
  }
  return runProjectCreate(ctx)
}
