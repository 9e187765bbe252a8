import { EXIT_CODE } from "../../core/constants"
import { gatherContext } from "../../context/gather"
import { formatContext } from "../../context/format"
import { getRepoRoot, isGitRepository } from "../../git/status"
import { ensureArgumentCount } from "../options"
import type { CommandContext } from "../runtime/command-context"

/** Session-start hook: writes the gathered context as markdown to stdout. */
export const runInjectContextCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 0 })
  const dir = (await isGitRepository(ctx.cwd)) ? await getRepoRoot(ctx.cwd) : ctx.cwd
  const context = await gatherContext(dir, ctx.now())
  ctx.stdout(formatContext(context).trimEnd())
  return EXIT_CODE.OK
}
