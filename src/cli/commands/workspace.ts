import { loadConfig, resolveWorkspaceDirectories, type WorkspaceDirectories } from "../../config/loader"
import type { GroveConfig } from "../../config/types"
import { listResumeTargets, loadState, saveState, type GroveState, type TrackedItem } from "../../core/state"
import { formatAge } from "../../utils/format"
import type { Theme } from "../../utils/ui"
import type { CommandContext } from "../runtime/command-context"

export type Workspace = {
  readonly configPath: string
  readonly config: GroveConfig
  readonly dirs: WorkspaceDirectories
  readonly state: GroveState
}

export const loadWorkspace = async (ctx: CommandContext): Promise<Workspace> => {
  const loaded = await loadConfig({ env: ctx.env, home: ctx.home })
  if (loaded.created) {
    ctx.logger.info(`created default config: ${loaded.path}`)
  }
  const dirs = resolveWorkspaceDirectories(loaded.config, ctx.home)
  return {
    configPath: loaded.path,
    config: loaded.config,
    dirs,
    state: await loadState(dirs.stateFile),
  }
}

export const saveWorkspaceState = async (workspace: Workspace, state: GroveState): Promise<Workspace> => {
  await saveState(workspace.dirs.stateFile, state)
  return { ...workspace, state }
}

export const isStale = (lastUsed: string, now: Date, staleAfterMs: number): boolean => {
  const time = Date.parse(lastUsed)
  return !Number.isNaN(time) && now.getTime() - time > staleAfterMs
}

export const itemTag = (item: TrackedItem): string => {
  switch (item.type) {
    case "experiment":
      return item.record.kind === "feature" ? "[feat]" : "[exp]"
    case "project":
      return "[project]"
    case "scratch":
      return "[scratch]"
  }
}

export const formatItemChoice = (item: TrackedItem, now: Date, theme: Theme): string => {
  const age = formatAge(new Date(item.record.lastUsed), now)
  return `${item.record.name} ${theme.muted(itemTag(item))} (${theme.muted(age)})`
}

/** Picker over every tracked item, most recently used first. Returns null when nothing is tracked. */
export const pickTrackedItem = async (
  ctx: CommandContext,
  state: GroveState,
  { message, theme = ctx.ui.theme }: { readonly message: string; readonly theme?: Theme },
): Promise<TrackedItem | null> => {
  const items = listResumeTargets(state)
  if (items.length === 0) {
    return null
  }
  const now = ctx.now()
  return ctx.prompter.select<TrackedItem>({
    message,
    choices: items.map((item) => ({ name: formatItemChoice(item, now, theme), value: item })),
  })
}
