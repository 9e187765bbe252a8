import { homedir } from "node:os"
import { join } from "node:path"
import { APP_NAME } from "../core/constants"

export const TMUX_SPLIT_DIRECTIONS = ["horizontal", "vertical"] as const

export type TmuxSplitDirection = (typeof TMUX_SPLIT_DIRECTIONS)[number]

export type RepoSettings = {
  readonly copyFiles: ReadonlyArray<string>
}

export type GroveConfig = {
  readonly baseDir: string
  readonly agent: string
  readonly agentFlags: ReadonlyArray<string>
  readonly editor: string
  readonly autoInit: boolean
  readonly repos: Readonly<Record<string, string>>
  readonly repoSettings: Readonly<Record<string, RepoSettings>>
  readonly lastRepo: string
  readonly tmuxSplitDirection: TmuxSplitDirection
}

/** Per-repository overrides read from `.grove.yml` in the source repository. */
export type RepoOverrides = {
  readonly agent?: string
  readonly agentFlags?: ReadonlyArray<string>
  readonly editor?: string
  readonly copyFiles?: ReadonlyArray<string>
}

export type SessionSettings = {
  readonly agent: string
  readonly agentFlags: ReadonlyArray<string>
  readonly editor: string
}

export const createDefaultConfig = (home: string = homedir()): GroveConfig => {
  return {
    baseDir: join(home, APP_NAME),
    agent: "claude",
    agentFlags: [],
    editor: "",
    autoInit: true,
    repos: {},
    repoSettings: {},
    lastRepo: "",
    tmuxSplitDirection: "horizontal",
  }
}
