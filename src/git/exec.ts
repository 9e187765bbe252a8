import { execa } from "execa"
import { createCliError } from "../core/errors"
import { createLogger } from "../utils/logger"
import { readProcessFailure } from "../utils/subprocess"

export type RunGitCommandInput = {
  readonly cwd: string
  readonly args: readonly string[]
  readonly reject?: boolean
}

export type RunGitCommandOutput = {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

const logger = createLogger({ prefix: "[git]" })

export const runGitCommand = async ({ cwd, args, reject = true }: RunGitCommandInput): Promise<RunGitCommandOutput> => {
  logger.debug(`git ${args.join(" ")} (cwd: ${cwd})`)
  try {
    const result = await execa("git", [...args], {
      cwd,
      reject,
    })
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? 0,
    }
  } catch (error) {
    const failure = readProcessFailure(error)
    throw createCliError("GIT_COMMAND_FAILED", {
      message: failure.stderr.trim().length > 0 ? `git ${args[0] ?? ""} failed: ${failure.stderr.trim()}` : "git command failed",
      details: {
        command: ["git", ...args],
        cwd,
        ...failure,
      },
      cause: error,
    })
  }
}

/**
 * Runs git without throwing on a non-zero exit and returns trimmed stdout,
 * or null when git failed or could not be started.
 */
export const readGitOutput = async (cwd: string, args: readonly string[]): Promise<string | null> => {
  try {
    const result = await runGitCommand({ cwd, args, reject: false })
    return result.exitCode === 0 ? result.stdout.trim() : null
  } catch (error) {
    logger.debug(`ignored git failure: ${error instanceof Error ? error.message : String(error)}`)
    return null
  }
}

export const doesGitRefExist = async (cwd: string, ref: string): Promise<boolean> => {
  const output = await readGitOutput(cwd, ["show-ref", "--verify", "--quiet", ref])
  return output !== null
}
