import { runAgent, type AgentCommand } from "./agent"
import { openEditor, type EditorLaunch } from "./editor"

/** Process side effects of a session, replaceable in tests. */
export type Launcher = {
  readonly runAgent: (command: AgentCommand) => Promise<void>
  readonly openEditor: (launch: EditorLaunch) => Promise<void>
}

export const createProcessLauncher = (): Launcher => {
  return { runAgent, openEditor }
}
