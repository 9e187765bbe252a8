import { EXIT_CODE } from "../../core/constants"
import { createCliError } from "../../core/errors"
import { pathExists } from "../../core/paths"
import { findTrackedItem, touchItem } from "../../core/state"
import { ensureArgumentCount } from "../options"
import { buildJsonSuccess } from "../output"
import type { CommandContext } from "../runtime/command-context"
import { loadWorkspace, pickTrackedItem, saveWorkspaceState } from "./workspace"

/**
 * Prints the path of a tracked item so a shell function can `cd` into it.
 * Only the path goes to stdout; prompts and messages use stderr.
 */
export const runOpenCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 1 })
  const workspace = await loadWorkspace(ctx)
  const name = ctx.commandArgs[0]

  const item =
    name === undefined
      ? await pickTrackedItem(ctx, workspace.state, { message: "Select to open" })
      : (findTrackedItem(workspace.state, name) ?? null)
  if (item === null) {
    throw createCliError("NOT_FOUND", {
      message: name === undefined ? "No experiments, projects, or scratch folders" : `Not found: ${name}`,
      details: { name: name ?? null },
    })
  }

  const { path } = item.record
  if (!(await pathExists(path))) {
    throw createCliError("PATH_NOT_FOUND", {
      message: `Path no longer exists: ${path}`,
      details: { name: item.record.name, path },
    })
  }

  await saveWorkspaceState(workspace, touchItem(workspace.state, item.type, item.key, ctx.now()))

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: ctx.command,
          status: "ok",
          repoRoot: null,
          details: { type: item.type, name: item.record.name, path },
        }),
      ),
    )
    return EXIT_CODE.OK
  }
  ctx.stdout(path)
  return EXIT_CODE.OK
}
