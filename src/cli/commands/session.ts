import { basename, resolve } from "node:path"
import { expandHomePath, loadRepoOverrides, resolveSessionSettings, saveConfig } from "../../config/loader"
import { listRegisteredRepos, resolveSavedCopyFiles, withCopyFiles } from "../../config/registry"
import type { GroveConfig, RepoOverrides, SessionSettings, TmuxSplitDirection } from "../../config/types"
import { APP_NAME } from "../../core/constants"
import { createCliError, ensureCliError } from "../../core/errors"
import { ensureRepositoryInitialized } from "../../core/init"
import { getOwn } from "../../core/json-storage"
import { resolvePathFromCwd } from "../../core/paths"
import { copyAgentDirectory, copyFiles, detectGitignoredFiles, type CopyResult } from "../../files/copy"
import { getRepoRoot, isGitRepository } from "../../git/status"
import { buildAgentCommand } from "../../integrations/agent"
import { resolveEditorLaunch } from "../../integrations/editor"
import type { CommandContext } from "../runtime/command-context"

const CURRENT_DIRECTORY_LABEL = "(current directory)"
const LAST_USED_SUFFIX = " (last used)"

/** Resolves a registered repository name, or a path that must be inside a git repository. */
export const resolveRepoInput = async (ctx: CommandContext, config: GroveConfig, value: string): Promise<string> => {
  const registered = getOwn(config.repos, value)
  if (registered !== undefined) {
    return resolve(expandHomePath(registered, ctx.home))
  }
  const path = resolvePathFromCwd({ cwd: ctx.cwd, path: expandHomePath(value, ctx.home) })
  if (!(await isGitRepository(path))) {
    throw createCliError("NOT_GIT_REPOSITORY", {
      message: `Not a git repository: ${value}`,
      details: { input: value, path },
    })
  }
  return getRepoRoot(path)
}

const currentRepoRoot = async (cwd: string): Promise<string | null> => {
  return (await isGitRepository(cwd)) ? getRepoRoot(cwd) : null
}

export const pickRepo = async (ctx: CommandContext, config: GroveConfig): Promise<string> => {
  const current = await currentRepoRoot(ctx.cwd)
  const registered = listRegisteredRepos(config).sort((left, right) => Number(right.lastUsed) - Number(left.lastUsed))
  const choices = [
    ...(current === null ? [] : [{ name: CURRENT_DIRECTORY_LABEL, value: current }]),
    ...registered.map((repo) => ({
      name: repo.lastUsed ? `${repo.name}${LAST_USED_SUFFIX}` : repo.name,
      value: resolve(expandHomePath(repo.path, ctx.home)),
    })),
  ]
  if (choices.length === 0) {
    throw createCliError("NO_REPOSITORIES", {
      message: `No repositories available. Register repos with: ${APP_NAME} repo add <path>`,
    })
  }
  return ctx.prompter.select<string>({ message: "Select repo", choices })
}

/**
 * Source repository for a new workspace: `-r`, then `-p`, then the current
 * repository, then a picker over the registered ones.
 */
export const resolveSourceRepo = async (ctx: CommandContext, config: GroveConfig): Promise<string> => {
  const requested = ctx.options.repos[0]
  if (requested !== undefined) {
    return resolveRepoInput(ctx, config, requested)
  }
  if (ctx.options.pick) {
    return pickRepo(ctx, config)
  }
  const current = await currentRepoRoot(ctx.cwd)
  if (current !== null) {
    return current
  }
  if (Object.keys(config.repos).length === 0) {
    throw createCliError("NO_REPOSITORIES", {
      message: `Not in a git repository. Register repos with: ${APP_NAME} repo add <path>`,
    })
  }
  return pickRepo(ctx, config)
}

/** Copies `.claude/` from the source, or writes a fresh one when `autoInit` is on. */
export const prepareAgentFiles = async (
  ctx: CommandContext,
  { config, source, target }: { readonly config: GroveConfig; readonly source: string | null; readonly target: string },
): Promise<void> => {
  try {
    if (source !== null && (await copyAgentDirectory(source, target))) {
      ctx.ui.info("Copied .claude/ configuration")
      return
    }
    if (config.autoInit && (await ensureRepositoryInitialized(target))) {
      ctx.ui.info("Initialized .claude/ configuration")
    }
  } catch (error) {
    ctx.ui.warn(`Failed to prepare .claude/: ${ensureCliError(error).message}`)
  }
}

const reportCopyResult = (ctx: CommandContext, result: CopyResult): void => {
  for (const file of result.copied) {
    ctx.ui.detail(`Copied ${file}`)
  }
  for (const failure of result.failed) {
    ctx.ui.warn(`Failed to copy ${failure.file}: ${failure.reason}`)
  }
}

/**
 * Copies gitignored files (`.env` and friends) into a new worktree. The first
 * time a repository is used each detected file is confirmed and the choice
 * is saved to `repoSettings`; later runs reuse it silently.
 */
export const copyGitignoredFiles = async (
  ctx: CommandContext,
  {
    configPath,
    config,
    source,
    target,
    overrides,
  }: {
    readonly configPath: string
    readonly config: GroveConfig
    readonly source: string
    readonly target: string
    readonly overrides: RepoOverrides
  },
): Promise<GroveConfig> => {
  const saved = resolveSavedCopyFiles(config, source, overrides)
  if (saved !== undefined) {
    if (saved.length > 0) {
      ctx.ui.info("Copying saved file preferences...")
      reportCopyResult(ctx, await copyFiles(source, target, saved))
    }
    return config
  }

  const detected = await detectGitignoredFiles(source)
  if (detected.length === 0) {
    return config
  }

  ctx.ui.info(`Found gitignored files in ${basename(source)}:`)
  for (const file of detected) {
    ctx.ui.detail(file)
  }
  const selected: string[] = []
  for (const file of detected) {
    if (await ctx.prompter.confirm({ message: `Copy ${file}?`, default: true })) {
      selected.push(file)
    }
  }
  ctx.ui.detail("These preferences will be saved for future workspaces from this repo.")

  const next = withCopyFiles(config, source, selected)
  await saveConfig({ path: configPath, config: next })

  if (selected.length > 0) {
    ctx.ui.info("Copying selected files...")
    reportCopyResult(ctx, await copyFiles(source, target, selected))
  }
  return next
}

export const resolveLaunchSettings = async (
  ctx: CommandContext,
  { config, repo }: { readonly config: GroveConfig; readonly repo: string | null },
): Promise<SessionSettings> => {
  return resolveSessionSettings({
    config,
    overrides: repo === null ? {} : await loadRepoOverrides(repo),
    agent: ctx.options.agent,
    editor: ctx.options.editor,
  })
}

/**
 * Opens the editor (unless `withEditor` is false or `--no-editor`), then runs
 * the agent in the foreground (unless `--no-agent`). Editor failures only warn.
 */
export const launchSession = async (
  ctx: CommandContext,
  {
    settings,
    workdir,
    editorDir = workdir,
    extraDirs = [],
    splitDirection,
    withEditor,
  }: {
    readonly settings: SessionSettings
    readonly workdir: string
    readonly editorDir?: string
    readonly extraDirs?: readonly string[]
    readonly splitDirection: TmuxSplitDirection
    readonly withEditor: boolean
  },
): Promise<void> => {
  if (withEditor && !ctx.options.noEditor && settings.editor.length > 0) {
    try {
      const launch = resolveEditorLaunch({ editor: settings.editor, workdir: editorDir, env: ctx.env, splitDirection })
      if (launch !== null) {
        await ctx.launcher.openEditor(launch)
        ctx.ui.info(`Opened ${settings.editor}`)
      }
    } catch (error) {
      ctx.ui.warn(`Could not open editor: ${ensureCliError(error).message}`)
    }
  }

  if (ctx.options.noAgent || settings.agent.length === 0) {
    return
  }
  ctx.ui.info(`Launching ${settings.agent}...`)
  ctx.ui.blank()
  await ctx.launcher.runAgent(
    buildAgentCommand({ agent: settings.agent, flags: settings.agentFlags, workdir, extraDirs }),
  )
}
