import { readdir, realpath, stat } from "node:fs/promises"
import { basename, join } from "node:path"
import { expandHomePath, saveConfig } from "../../config/loader"
import { listRegisteredRepos, registerRepo, unregisterRepo } from "../../config/registry"
import type { GroveConfig } from "../../config/types"
import { APP_NAME, EXIT_CODE } from "../../core/constants"
import { createCliError, ensureCliError } from "../../core/errors"
import { getOwn } from "../../core/json-storage"
import { resolvePathFromCwd } from "../../core/paths"
import { getRepoRoot, isGitRepository } from "../../git/status"
import { ensureArgumentCount } from "../options"
import { buildJsonSuccess } from "../output"
import type { CommandContext } from "../runtime/command-context"
import { loadWorkspace, type Workspace } from "./workspace"

const REPO_SUBCOMMANDS = ["add", "list", "remove"] as const

type ScanSummary = {
  readonly config: GroveConfig
  readonly added: readonly string[]
  readonly existing: readonly string[]
  readonly skipped: readonly string[]
}

const isDirectory = async (path: string): Promise<boolean | null> => {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return null
  }
}

/** Registers every direct child of `dir` that is the root of a git repository. */
const scanDirectory = async (ctx: CommandContext, config: GroveConfig, dir: string): Promise<ScanSummary> => {
  const entries = (await readdir(dir, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort()

  let next = config
  const added: string[] = []
  const existing: string[] = []
  const skipped: string[] = []
  for (const name of entries) {
    const path = join(dir, name)
    if (!(await isGitRepository(path)) || (await getRepoRoot(path)) !== (await realpath(path))) {
      continue
    }
    try {
      const result = registerRepo(next, { repoPath: path })
      next = result.config
      if (result.status === "added") {
        added.push(name)
        ctx.ui.success(`Registered '${name}'`)
      } else {
        existing.push(name)
      }
    } catch (error) {
      const cliError = ensureCliError(error)
      if (cliError.code !== "ALREADY_EXISTS") {
        throw cliError
      }
      skipped.push(name)
      ctx.ui.warn(`Skipped '${name}' - name already used for ${getOwn(next.repos, name) ?? "another path"}`)
    }
  }
  return { config: next, added, existing, skipped }
}

const runRepoAdd = async (ctx: CommandContext, workspace: Workspace, args: readonly string[]): Promise<number> => {
  ensureArgumentCount({ command: "repo add", args, min: 0, max: 1 })
  const input = args[0] ?? "."
  const path = resolvePathFromCwd({ cwd: ctx.cwd, path: expandHomePath(input, ctx.home) })

  if (await isGitRepository(path)) {
    const repoPath = await getRepoRoot(path)
    const result = registerRepo(workspace.config, { repoPath, name: ctx.options.name })
    const name = ctx.options.name ?? basename(repoPath)
    if (result.status === "added") {
      await saveConfig({ path: workspace.configPath, config: result.config })
    }
    if (ctx.options.json) {
      ctx.stdout(
        JSON.stringify(
          buildJsonSuccess({
            command: "repo add",
            status: result.status === "added" ? "created" : "existing",
            repoRoot: repoPath,
            details: { name, path: repoPath },
          }),
        ),
      )
      return EXIT_CODE.OK
    }
    if (result.status === "existing") {
      ctx.ui.info(`Repository '${name}' is already registered`)
      return EXIT_CODE.OK
    }
    ctx.ui.success(`Registered repository '${name}'`)
    ctx.ui.keyValue("Path", repoPath)
    return EXIT_CODE.OK
  }

  const directory = await isDirectory(path)
  if (directory === null) {
    throw createCliError("PATH_NOT_FOUND", { message: `Path not found: ${path}`, details: { path } })
  }
  if (!directory) {
    throw createCliError("NOT_GIT_REPOSITORY", { message: `Not a git repository: ${path}`, details: { path } })
  }

  const summary = await scanDirectory(ctx, workspace.config, path)
  if (summary.added.length + summary.existing.length + summary.skipped.length === 0) {
    throw createCliError("NOT_FOUND", {
      message: `No git repositories found in ${path}`,
      details: { path },
    })
  }
  if (summary.added.length > 0) {
    await saveConfig({ path: workspace.configPath, config: summary.config })
  }

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: "repo add",
          status: summary.added.length > 0 ? "created" : "existing",
          repoRoot: null,
          details: { added: summary.added, existing: summary.existing, skipped: summary.skipped },
        }),
      ),
    )
    return EXIT_CODE.OK
  }
  ctx.ui.blank()
  ctx.ui.info(`Registered ${String(summary.added.length)} repositories`)
  if (summary.existing.length > 0) {
    ctx.ui.detail(`${String(summary.existing.length)} already registered`)
  }
  if (summary.skipped.length > 0) {
    ctx.ui.detail(`${String(summary.skipped.length)} skipped (name conflicts)`)
  }
  return EXIT_CODE.OK
}

const runRepoList = (ctx: CommandContext, workspace: Workspace, args: readonly string[]): number => {
  ensureArgumentCount({ command: "repo list", args, min: 0, max: 0 })
  const repos = listRegisteredRepos(workspace.config)

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: "repo list",
          status: "ok",
          repoRoot: null,
          details: { repos },
        }),
      ),
    )
    return EXIT_CODE.OK
  }

  if (repos.length === 0) {
    ctx.ui.info("No repositories registered")
    ctx.ui.detail(`Use: ${APP_NAME} repo add <path>`)
    return EXIT_CODE.OK
  }
  ctx.ui.header("Registered repositories:")
  for (const repo of repos) {
    const suffix = repo.lastUsed ? ctx.ui.theme.muted(" (last used)") : ""
    ctx.ui.detail(`${ctx.ui.theme.name(repo.name)}${suffix}`)
    ctx.ui.detail(`  ${ctx.ui.theme.muted(repo.path)}`)
  }
  return EXIT_CODE.OK
}

const runRepoRemove = async (ctx: CommandContext, workspace: Workspace, args: readonly string[]): Promise<number> => {
  ensureArgumentCount({ command: "repo remove", args, min: 1, max: 1 })
  const name = args[0] ?? ""
  const config = unregisterRepo(workspace.config, name)
  await saveConfig({ path: workspace.configPath, config })

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({ command: "repo remove", status: "deleted", repoRoot: null, details: { name } }),
      ),
    )
    return EXIT_CODE.OK
  }
  ctx.ui.success(`Removed repository '${name}'`)
  return EXIT_CODE.OK
}

/** `repo add|list|remove`: the registry of repositories used by the pickers. */
export const runRepoCommand = async (ctx: CommandContext): Promise<number> => {
  const [subcommand, ...args] = ctx.commandArgs
  const known = REPO_SUBCOMMANDS.find((candidate) => candidate === subcommand)
  if (known === undefined) {
    throw createCliError("INVALID_ARGUMENT", {
      message:
        subcommand === undefined
          ? `Missing subcommand (expected: ${REPO_SUBCOMMANDS.join(", ")})`
          : `Unknown repo subcommand: ${subcommand}`,
      details: { subcommand: subcommand ?? null, expected: REPO_SUBCOMMANDS },
    })
  }

  const workspace = await loadWorkspace(ctx)
  switch (known) {
    case "add":
      return runRepoAdd(ctx, workspace, args)
    case "list":
      return runRepoList(ctx, workspace, args)
    case "remove":
      return runRepoRemove(ctx, workspace, args)
  }
}
