import { execa } from "execa"
import { createCliError } from "../core/errors"
import { createLogger } from "../utils/logger"
import { readProcessFailure } from "../utils/subprocess"

export const DEFAULT_AGENT = "claude"

export type AgentCommand = {
  readonly file: string
  readonly args: ReadonlyArray<string>
  readonly cwd: string
}

export type BuildAgentCommandInput = {
  readonly agent: string
  readonly flags?: ReadonlyArray<string>
  readonly workdir: string
  readonly extraDirs?: ReadonlyArray<string>
}

const logger = createLogger({ prefix: "[agent]" })

/**
 * The default agent understands `--add-dir` for multi-repository sessions.
 * Any other agent is a command line whose `.` arguments become the workdir.
 */
export const buildAgentCommand = ({
  agent,
  flags = [],
  workdir,
  extraDirs = [],
}: BuildAgentCommandInput): AgentCommand => {
  const parts = agent.trim().split(/\s+/).filter((part) => part.length > 0)
  const [file, ...rest] = parts
  if (file === undefined || (file === DEFAULT_AGENT && rest.length === 0)) {
    return {
      file: DEFAULT_AGENT,
      args: [...extraDirs.flatMap((dir) => ["--add-dir", dir]), ...flags],
      cwd: workdir,
    }
  }
  return {
    file,
    args: [...rest.map((arg) => (arg === "." ? workdir : arg)), ...flags],
    cwd: workdir,
  }
}

export const formatAgentCommand = (command: AgentCommand): string => {
  return [command.file, ...command.args].join(" ")
}

/** Runs the agent in the foreground with the terminal attached. */
export const runAgent = async (command: AgentCommand): Promise<void> => {
  logger.debug(`launching ${formatAgentCommand(command)} (cwd: ${command.cwd})`)
  try {
    await execa(command.file, [...command.args], {
      cwd: command.cwd,
      stdio: "inherit",
    })
  } catch (error) {
    const failure = readProcessFailure(error)
    if (failure.code === "ENOENT") {
      throw createCliError("DEPENDENCY_MISSING", {
        message: `Agent command not found: ${command.file}`,
        details: { command: command.file },
        cause: error,
      })
    }
    throw createCliError("CHILD_PROCESS_FAILED", {
      message:
        failure.exitCode === undefined
          ? `${command.file} failed: ${failure.shortMessage}`
          : `${command.file} exited with code ${String(failure.exitCode)}`,
      details: { command: [command.file, ...command.args], cwd: command.cwd, exitCode: failure.exitCode },
      cause: error,
    })
  }
}
