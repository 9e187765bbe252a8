import { basename } from "node:path"
import { APP_NAME, EXIT_CODE } from "../../core/constants"
import { createCliError } from "../../core/errors"
import { AGENT_SETTINGS_PATH, initializeRepository } from "../../core/init"
import { getRepoRoot, isGitRepository } from "../../git/status"
import { ensureArgumentCount } from "../options"
import { buildJsonSuccess } from "../output"
import type { CommandContext } from "../runtime/command-context"

export const runInitCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 0 })
  if (!(await isGitRepository(ctx.cwd))) {
    throw createCliError("NOT_GIT_REPOSITORY", {
      message: "Not in a git repository",
      details: { cwd: ctx.cwd },
    })
  }
  const repoRoot = await getRepoRoot(ctx.cwd)
  const result = await initializeRepository({ repoRoot, force: ctx.options.force })
  const skipped = result.alreadyInitialized && !ctx.options.force

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: ctx.command,
          status: skipped ? "existing" : "created",
          repoRoot,
          details: { written: result.written },
        }),
      ),
    )
    return EXIT_CODE.OK
  }

  if (skipped) {
    ctx.ui.warn(`${AGENT_SETTINGS_PATH} already exists`)
    ctx.ui.detail("Use --force to overwrite")
    return EXIT_CODE.OK
  }

  ctx.ui.header(`Initializing ${APP_NAME} in ${basename(repoRoot)}`)
  for (const file of result.written) {
    ctx.ui.info(`Wrote ${file}`)
  }
  ctx.ui.success(`${APP_NAME} initialized!`)
  ctx.ui.detail(`SessionStart hook will call: ${APP_NAME} inject-context`)
  ctx.ui.detail("Use /drop to save session context before stopping")
  return EXIT_CODE.OK
}
