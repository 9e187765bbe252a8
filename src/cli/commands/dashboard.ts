import { basename } from "node:path"
import { APP_NAME, EXIT_CODE, STALE_AFTER_MS } from "../../core/constants"
import { pathExists } from "../../core/paths"
import type { GroveState } from "../../core/state"
import { hasUncommittedChanges } from "../../git/status"
import { formatAge } from "../../utils/format"
import type { CommandContext } from "../runtime/command-context"
import { isStale, loadWorkspace } from "./workspace"

const EXPERIMENT_PREVIEW = 5
const PROJECT_PREVIEW = 5
const SCRATCH_PREVIEW = 3

type DashboardAction = "resume" | "exp" | "project" | "scratch" | "repo" | "cleanup" | "list" | "exit"

type DashboardLine = {
  readonly label: string
  readonly lastUsed: string
  readonly dirty: boolean
}

const newestFirst = <T extends { readonly lastUsed: string }>(records: readonly T[]): T[] => {
  return [...records].sort((left, right) => Date.parse(right.lastUsed) - Date.parse(left.lastUsed))
}

const isDirty = async (path: string): Promise<boolean> => {
  if (!(await pathExists(path))) {
    return false
  }
  return hasUncommittedChanges(path).catch(() => false)
}

const printSection = (
  ctx: CommandContext,
  { title, lines, limit }: { readonly title: string; readonly lines: readonly DashboardLine[]; readonly limit: number },
): void => {
  if (lines.length === 0) {
    return
  }
  const now = ctx.now()
  const { theme } = ctx.ui
  ctx.ui.header(title)
  for (const line of lines.slice(0, limit)) {
    const stale = isStale(line.lastUsed, now, STALE_AFTER_MS) ? theme.warn(" (stale)") : ""
    const dirty = line.dirty ? theme.dirty(" *") : ""
    ctx.ui.line(`  ${line.label} - ${theme.muted(formatAge(new Date(line.lastUsed), now))}${stale}${dirty}`)
  }
  if (lines.length > limit) {
    ctx.ui.line(theme.muted(`  ... and ${String(lines.length - limit)} more`))
  }
  ctx.ui.blank()
}

const summarize = async (ctx: CommandContext, state: GroveState): Promise<number> => {
  const { theme } = ctx.ui
  const experiments = await Promise.all(
    newestFirst(Object.values(state.experiments)).map(async (record) => ({
      label: `${theme.name(record.name)} ${theme.muted(`(${basename(record.repo)})`)}`,
      lastUsed: record.lastUsed,
      dirty: await isDirty(record.path),
    })),
  )
  const projects = newestFirst(Object.values(state.projects)).map((record) => ({
    label: `${theme.name(record.name)} ${theme.muted(`(${record.repos.map((repo) => repo.name).join(", ")})`)}`,
    lastUsed: record.lastUsed,
    dirty: false,
  }))
  const scratches = newestFirst(Object.values(state.scratches)).map((record) => ({
    label: theme.name(record.name),
    lastUsed: record.lastUsed,
    dirty: false,
  }))

  printSection(ctx, { title: "Active experiments:", lines: experiments, limit: EXPERIMENT_PREVIEW })
  printSection(ctx, { title: "Active projects:", lines: projects, limit: PROJECT_PREVIEW })
  printSection(ctx, { title: "Scratch folders:", lines: scratches, limit: SCRATCH_PREVIEW })
  return experiments.length + projects.length + scratches.length
}

/** Shown when `grove` runs without a command: a summary, then an action menu on a terminal. */
export const runDashboard = async (ctx: CommandContext): Promise<number> => {
  const workspace = await loadWorkspace(ctx)
  ctx.ui.header(APP_NAME)
  ctx.ui.blank()

  const total = await summarize(ctx, workspace.state)
  if (total === 0) {
    ctx.ui.info("No active experiments, projects, or scratch folders")
    ctx.ui.blank()
  }

  if (!ctx.isInteractive) {
    ctx.ui.detail(`Run '${APP_NAME} help' for commands`)
    return EXIT_CODE.OK
  }

  const action = await ctx.prompter.select<DashboardAction>({
    message: "What would you like to do?",
    choices: [
      ...(total > 0 ? [{ name: "Resume a session", value: "resume" as const }] : []),
      { name: "New experiment", value: "exp" },
      { name: "New project", value: "project" },
      { name: "New scratch folder", value: "scratch" },
      { name: "Register repo", value: "repo" },
      ...(total > 0 ? [{ name: "Clean up", value: "cleanup" as const }] : []),
      { name: "List everything", value: "list" },
      { name: "Exit", value: "exit" },
    ],
  })

  switch (action) {
    case "exit":
      return EXIT_CODE.OK
    case "repo": {
      const path = await ctx.prompter.input({ message: "Repository path", default: "." })
      return ctx.runCommand("repo", ["add", path.length > 0 ? path : "."])
    }
    case "resume":
    case "exp":
    case "project":
    case "scratch":
    case "cleanup":
    case "list":
      return ctx.runCommand(action, [])
  }
}
