import { createRequire } from "node:module"
import { homedir } from "node:os"
import { parseArgs } from "citty"
import type { ArgsDef } from "citty"
import { COMMAND_NAMES, EXIT_CODE } from "../core/constants"
import { createCliError, ensureCliError } from "../core/errors"
import { createProcessLauncher, type Launcher } from "../integrations/launcher"
import { createInquirerPrompter, createNonInteractivePrompter, type Prompter } from "../integrations/prompt"
import { createLogger, LogLevel, type Logger } from "../utils/logger"
import { createUi } from "../utils/ui"
import { runCleanupCommand } from "./commands/cleanup"
import { runDashboard } from "./commands/dashboard"
import { runWorkspaceCommand } from "./commands/experiment"
import {
  createInfoCommandHandlers,
  createSessionCommandHandlers,
  createSetupCommandHandlers,
  createWorkspaceCommandHandlers,
  dispatchCommandHandler,
} from "./commands/handler-groups"
import { runInitCommand } from "./commands/init"
import { runInjectContextCommand } from "./commands/inject-context"
import { runListCommand } from "./commands/list"
import { runOpenCommand } from "./commands/open"
import { runProjectCommand } from "./commands/project"
import { runRepoCommand } from "./commands/repo"
import { runResumeCommand } from "./commands/resume"
import { runScratchCommand } from "./commands/scratch"
import { runStatusCommand } from "./commands/status"
import { commandHelpEntries, findCommandHelp, renderCommandHelpText, renderGeneralHelpText } from "./help"
import {
  buildOptionSpecs,
  collectOptionValues,
  extractLaunchSwitches,
  getPositionals,
  readStringOption,
  splitRawArgsByDoubleDash,
  validateRawOptions,
} from "./options"
import { buildJsonError } from "./output"
import { loadPackageVersion } from "./package-version"
import type { CommandContext, ParsedOptions } from "./runtime/command-context"

export type CLI = {
  run(args?: string[]): Promise<number>
}

type CLIOptions = {
  readonly version?: string
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
  readonly home?: string
  readonly now?: () => Date
  readonly stdout?: (line: string) => void
  readonly stderr?: (line: string) => void
  readonly prompter?: Prompter
  readonly launcher?: Launcher
  readonly isInteractive?: () => boolean
}

const rootArgsDef = {
  command: {
    type: "positional",
    description: "Command name",
    required: false,
  },
  json: {
    type: "boolean",
    description: "Output JSON on stdout",
  },
  verbose: {
    type: "boolean",
    description: "Show detailed logs",
  },
  repo: {
    type: "string",
    alias: "r",
    valueHint: "name|path",
    description: "Registered repository name or path (repeatable for project)",
  },
  pick: {
    type: "boolean",
    alias: "p",
    description: "Pick the repository from a list",
  },
  branch: {
    type: "string",
    alias: "b",
    valueHint: "branch",
    description: "Branch name",
  },
  open: {
    type: "string",
    alias: "o",
    valueHint: "editor",
    description: "Editor to open",
  },
  editor: {
    type: "string",
    alias: "e",
    valueHint: "editor",
    description: "Editor to open (same as --open)",
  },
  agent: {
    type: "string",
    alias: "a",
    valueHint: "cmd",
    description: "Agent command to launch",
  },
  force: {
    type: "boolean",
    alias: "f",
    description: "Skip confirmations",
  },
  yes: {
    type: "boolean",
    alias: "y",
    description: "Proceed without confirming warnings",
  },
  name: {
    type: "string",
    valueHint: "name",
    description: "Name used by repo add",
  },
  help: {
    type: "boolean",
    alias: "h",
    description: "Show help",
  },
  version: {
    type: "boolean",
    alias: "v",
    description: "Show version",
  },
} satisfies ArgsDef

const optionSpecs = buildOptionSpecs(rootArgsDef)

export const createCli = (options: CLIOptions = {}): CLI => {
  const require = createRequire(import.meta.url)
  const version =
    options.version ??
    ((): string => {
      try {
        return loadPackageVersion(require)
      } catch {
        return "0.0.0"
      }
    })()

  const runtimeCwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  const home = options.home ?? env.HOME ?? homedir()
  const now = options.now ?? ((): Date => new Date())
  const stdout = options.stdout ?? ((line: string): void => console.log(line))
  const stderr = options.stderr ?? ((line: string): void => console.error(line))
  const launcher = options.launcher ?? createProcessLauncher()
  const isInteractiveFn =
    options.isInteractive ?? ((): boolean => process.stdin.isTTY === true && process.stdout.isTTY === true)

  let logger: Logger = createLogger({ write: stderr })

  const createPrompter = (command: string, isInteractive: boolean): Prompter => {
    if (options.prompter !== undefined) {
      return options.prompter
    }
    if (!isInteractive) {
      return createNonInteractivePrompter()
    }
    return createInquirerPrompter({ output: command === COMMAND_NAMES.OPEN ? process.stderr : process.stdout })
  }

  const buildContext = ({
    command,
    commandArgs,
    parsedOptions,
    isInteractive,
  }: {
    readonly command: string
    readonly commandArgs: readonly string[]
    readonly parsedOptions: ParsedOptions
    readonly isInteractive: boolean
  }): CommandContext => {
    // open prints a path for $(...), so everything else goes to stderr
    const write = command === COMMAND_NAMES.OPEN ? stderr : stdout
    const ctx: CommandContext = {
      command,
      commandArgs,
      options: parsedOptions,
      cwd: runtimeCwd,
      env,
      home,
      now,
      stdout,
      stderr,
      color: isInteractive,
      ui: createUi({ write, color: isInteractive }),
      prompter: createPrompter(command, isInteractive),
      launcher,
      isInteractive,
      logger,
      runCommand: (nextCommand, nextArgs) =>
        dispatch(buildContext({ command: nextCommand, commandArgs: nextArgs, parsedOptions, isInteractive })),
    }
    return ctx
  }

  const dispatch = async (ctx: CommandContext): Promise<number> => {
    const handlerGroups = [
      createWorkspaceCommandHandlers({
        expHandler: () => runWorkspaceCommand(ctx, "experiment"),
        featHandler: () => runWorkspaceCommand(ctx, "feature"),
        scratchHandler: () => runScratchCommand(ctx),
        projectHandler: () => runProjectCommand(ctx),
      }),
      createSessionCommandHandlers({
        resumeHandler: () => runResumeCommand(ctx),
        openHandler: () => runOpenCommand(ctx),
        cleanupHandler: () => runCleanupCommand(ctx),
      }),
      createInfoCommandHandlers({
        listHandler: () => runListCommand(ctx),
        statusHandler: () => runStatusCommand(ctx),
        injectContextHandler: () => runInjectContextCommand(ctx),
      }),
      createSetupCommandHandlers({
        repoHandler: () => runRepoCommand(ctx),
        initHandler: () => runInitCommand(ctx),
      }),
    ]
    for (const handlers of handlerGroups) {
      const exitCode = await dispatchCommandHandler({ command: ctx.command, handlers })
      if (exitCode !== undefined) {
        return exitCode
      }
    }
    throw createCliError("UNKNOWN_COMMAND", {
      message: `Unknown command: ${ctx.command}`,
      details: { availableCommands: commandHelpEntries.map((entry) => entry.name) },
    })
  }

  const run = async (rawArgs: string[] = process.argv.slice(2)): Promise<number> => {
    logger = createLogger({ write: stderr })
    let command = "unknown"
    let jsonEnabled = false

    try {
      const { beforeDoubleDash } = splitRawArgsByDoubleDash(rawArgs)
      const { args, switches } = extractLaunchSwitches(beforeDoubleDash)
      validateRawOptions(args, optionSpecs)
      const parsedArgs = parseArgs(args, rootArgsDef)
      const positionals = getPositionals(parsedArgs)
      command = positionals[0] ?? "unknown"
      jsonEnabled = parsedArgs.json === true

      if (parsedArgs.help === true) {
        const commandHelpTarget = command !== "unknown" && command !== "help" ? command : null
        if (commandHelpTarget !== null) {
          const entry = findCommandHelp(commandHelpTarget)
          if (entry !== undefined) {
            stdout(`${renderCommandHelpText({ entry })}\n`)
            return EXIT_CODE.OK
          }
        }
        stdout(`${renderGeneralHelpText({ version })}\n`)
        return EXIT_CODE.OK
      }

      if (parsedArgs.version === true) {
        stdout(version)
        return EXIT_CODE.OK
      }

      logger =
        parsedArgs.verbose === true ? createLogger({ level: LogLevel.INFO, write: stderr }) : createLogger({ write: stderr })

      if (command === "help") {
        const helpTarget = positionals[1]
        if (helpTarget === undefined || helpTarget.length === 0) {
          stdout(`${renderGeneralHelpText({ version })}\n`)
          return EXIT_CODE.OK
        }
        const entry = findCommandHelp(helpTarget)
        if (entry === undefined) {
          throw createCliError("INVALID_ARGUMENT", {
            message: `Unknown command for help: ${helpTarget}`,
            details: {
              requested: helpTarget,
              availableCommands: commandHelpEntries.map((item) => item.name),
            },
          })
        }
        stdout(`${renderCommandHelpText({ entry })}\n`)
        return EXIT_CODE.OK
      }

      const parsedOptions: ParsedOptions = {
        json: jsonEnabled,
        verbose: parsedArgs.verbose === true,
        repos: collectOptionValues({ args, longName: "repo", shortName: "r" }),
        pick: parsedArgs.pick === true,
        branch: readStringOption(parsedArgs.branch),
        editor: readStringOption(parsedArgs.open) ?? readStringOption(parsedArgs.editor),
        agent: readStringOption(parsedArgs.agent),
        noAgent: switches.has("--no-agent"),
        noEditor: switches.has("--no-editor"),
        force: parsedArgs.force === true,
        yes: parsedArgs.yes === true,
        name: readStringOption(parsedArgs.name),
      }
      logger.debug(`command=${command} options=${JSON.stringify(parsedOptions)}`)

      const isInteractive = isInteractiveFn()
      if (positionals.length === 0) {
        command = "dashboard"
        return await runDashboard(buildContext({ command, commandArgs: [], parsedOptions, isInteractive }))
      }
      return await dispatch(buildContext({ command, commandArgs: positionals.slice(1), parsedOptions, isInteractive }))
    } catch (error) {
      const cliError = ensureCliError(error)
      if (jsonEnabled) {
        stdout(
          JSON.stringify(
            buildJsonError({
              command,
              repoRoot: null,
              error: cliError,
            }),
          ),
        )
      } else {
        stderr(`[${cliError.code}] ${cliError.message}`)
        logger.debug(JSON.stringify(cliError.details))
      }
      return cliError.exitCode
    }
  }

  return { run }
}
