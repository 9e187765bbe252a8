import type { Launcher } from "../../integrations/launcher"
import type { Prompter } from "../../integrations/prompt"
import type { Logger } from "../../utils/logger"
import type { Ui } from "../../utils/ui"

export type ParsedOptions = {
  readonly json: boolean
  readonly verbose: boolean
  readonly repos: readonly string[]
  readonly pick: boolean
  readonly branch: string | undefined
  /** `-o/--open` or `-e/--editor`. */
  readonly editor: string | undefined
  readonly agent: string | undefined
  readonly noAgent: boolean
  readonly noEditor: boolean
  readonly force: boolean
  readonly yes: boolean
  readonly name: string | undefined
}

export type CommandContext = {
  readonly command: string
  readonly commandArgs: readonly string[]
  readonly options: ParsedOptions
  readonly cwd: string
  readonly env: NodeJS.ProcessEnv
  readonly home: string
  readonly now: () => Date
  readonly stdout: (line: string) => void
  readonly stderr: (line: string) => void
  readonly color: boolean
  readonly ui: Ui
  readonly prompter: Prompter
  readonly launcher: Launcher
  readonly isInteractive: boolean
  readonly logger: Logger
  /** Runs another command with the same options, used by the dashboard. */
  readonly runCommand: (command: string, commandArgs: readonly string[]) => Promise<number>
}
