import { mkdir } from "node:fs/promises"
import { EXIT_CODE } from "../../core/constants"
import { createCliError } from "../../core/errors"
import { getOwn } from "../../core/json-storage"
import { writeWorkspaceMetadata } from "../../core/metadata"
import { extractTicket, validateName } from "../../core/names"
import { pathExists, resolveChildPath } from "../../core/paths"
import { addScratch } from "../../core/state"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"
import { resumeScratch } from "./resume"
import { launchSession, prepareAgentFiles, resolveLaunchSettings } from "./session"
import { loadWorkspace, saveWorkspaceState } from "./workspace"

export const runScratchCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const workspace = await loadWorkspace(ctx)
  const name = validateName(ctx.commandArgs[0] ?? (await ctx.prompter.input({ message: "Scratch folder name" })))

  const existing = getOwn(workspace.state.scratches, name)
  if (existing !== undefined) {
    ctx.ui.warn(`Scratch '${name}' already exists`)
    ctx.ui.keyValue("Path", existing.path)
    if (!(await ctx.prompter.confirm({ message: "Resume existing scratch?", default: false }))) {
      ctx.ui.info("Aborted")
      return EXIT_CODE.OK
    }
    return resumeScratch(ctx, workspace, existing)
  }

  const path = resolveChildPath({ rootPath: workspace.dirs.scratch, name })
  if (await pathExists(path)) {
    throw createCliError("ALREADY_EXISTS", {
      message: `Scratch folder already exists: ${path}`,
      details: { path },
    })
  }

  ctx.ui.header(`Creating scratch: ${name}`)
  ctx.ui.keyValue("Path", path)
  await mkdir(path, { recursive: true })
  await prepareAgentFiles(ctx, { config: { ...workspace.config, autoInit: true }, source: null, target: path })

  const ticket = extractTicket(name)
  const created = ctx.now().toISOString()
  await writeWorkspaceMetadata(path, { type: "scratch", name, ticket, created })
  await saveWorkspaceState(
    workspace,
    addScratch(workspace.state, { name, path, ticket, created, lastUsed: created }),
  )

  ctx.ui.success("Scratch folder created!")
  await launchSession(ctx, {
    settings: await resolveLaunchSettings(ctx, { config: workspace.config, repo: null }),
    workdir: path,
    splitDirection: workspace.config.tmuxSplitDirection,
    withEditor: false,
  })
  return EXIT_CODE.OK
}
