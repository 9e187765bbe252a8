import { once } from "node:events"
import { execa } from "execa"
import type { TmuxSplitDirection } from "../config/types"
import { createCliError } from "../core/errors"
import { createLogger } from "../utils/logger"

const TERMINAL_EDITORS: ReadonlySet<string> = new Set(["nvim", "neovim", "vim"])

export type EditorLaunch = {
  readonly file: string
  readonly args: ReadonlyArray<string>
  readonly cwd: string
  readonly detached: boolean
}

const logger = createLogger({ prefix: "[editor]" })

/**
 * GUI editors start detached. Terminal editors open in a tmux split next to
 * the agent and therefore require a tmux session.
 */
export const resolveEditorLaunch = ({
  editor,
  workdir,
  env = process.env,
  splitDirection = "horizontal",
}: {
  readonly editor: string
  readonly workdir: string
  readonly env?: NodeJS.ProcessEnv
  readonly splitDirection?: TmuxSplitDirection
}): EditorLaunch | null => {
  const name = editor.trim()
  if (name.length === 0) {
    return null
  }
  if (TERMINAL_EDITORS.has(name)) {
    const tmux = env.TMUX
    if (tmux === undefined || tmux.length === 0) {
      throw createCliError("TMUX_REQUIRED", {
        message: "nvim requires tmux for split view. Use --open cursor or --open code instead",
        details: { editor: name },
      })
    }
    return {
      file: "tmux",
      args: ["split-window", splitDirection === "vertical" ? "-v" : "-h", "-c", workdir, "nvim", "."],
      cwd: workdir,
      detached: false,
    }
  }
  return { file: name, args: [workdir], cwd: workdir, detached: true }
}

export const openEditor = async (launch: EditorLaunch): Promise<void> => {
  logger.debug(`opening ${launch.file} ${launch.args.join(" ")}`)
  if (!launch.detached) {
    await execa(launch.file, [...launch.args], { cwd: launch.cwd })
    return
  }
  const subprocess = execa(launch.file, [...launch.args], {
    cwd: launch.cwd,
    detached: true,
    stdio: "ignore",
  })
  void subprocess.catch((error: unknown) => {
    logger.debug(`${launch.file} ended: ${error instanceof Error ? error.message : String(error)}`)
  })
  await once(subprocess, "spawn")
  subprocess.unref()
}
