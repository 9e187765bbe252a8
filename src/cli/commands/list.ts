import { basename } from "node:path"
import { getBorderCharacters, table } from "table"
import { APP_NAME, EXIT_CODE, STALE_AFTER_MS } from "../../core/constants"
import { pathExists } from "../../core/paths"
import type { ExperimentRecord, GroveState } from "../../core/state"
import { hasUncommittedChanges } from "../../git/status"
import { formatAge } from "../../utils/format"
import type { Theme } from "../../utils/ui"
import { ensureArgumentCount } from "../options"
import { buildJsonSuccess } from "../output"
import type { CommandContext } from "../runtime/command-context"
import { isStale, loadWorkspace } from "./workspace"

export type ExperimentStatus = "clean" | "uncommitted" | "missing"

const STALE_MARKER = " ⚠"

const resolveExperimentStatus = async (record: ExperimentRecord): Promise<ExperimentStatus> => {
  if (!(await pathExists(record.path))) {
    return "missing"
  }
  const dirty = await hasUncommittedChanges(record.path).catch(() => false)
  return dirty ? "uncommitted" : "clean"
}

const sortedEntries = <T extends { readonly lastUsed: string }>(records: Readonly<Record<string, T>>): Array<[string, T]> => {
  return Object.entries(records).sort(([, left], [, right]) => Date.parse(right.lastUsed) - Date.parse(left.lastUsed))
}

const renderTable = (rows: string[][], theme: Theme): string[] => {
  const rendered = table(rows, {
    border: getBorderCharacters("norc"),
    drawHorizontalLine: (lineIndex, rowCount) => {
      return lineIndex === 0 || lineIndex === 1 || lineIndex === rowCount
    },
  })
  return rendered
    .trimEnd()
    .split("\n")
    .map((line) => (line.startsWith("│") ? line : theme.muted(line)))
}

const headerRow = (theme: Theme, labels: readonly string[]): string[] => labels.map((label) => theme.header(label))

const colorStatus = (theme: Theme, status: ExperimentStatus): string => {
  switch (status) {
    case "clean":
      return theme.clean(status)
    case "uncommitted":
      return theme.dirty(status)
    case "missing":
      return theme.error(status)
  }
}

const collectListing = async (state: GroveState, now: Date) => {
  const experiments = await Promise.all(
    sortedEntries(state.experiments).map(async ([key, record]) => ({
      key,
      ...record,
      status: await resolveExperimentStatus(record),
      stale: isStale(record.lastUsed, now, STALE_AFTER_MS),
    })),
  )
  const projects = await Promise.all(
    sortedEntries(state.projects).map(async ([key, record]) => ({
      key,
      ...record,
      status: (await pathExists(record.path)) ? "present" : "missing",
      stale: isStale(record.lastUsed, now, STALE_AFTER_MS),
    })),
  )
  const scratches = await Promise.all(
    sortedEntries(state.scratches).map(async ([key, record]) => ({
      key,
      ...record,
      status: (await pathExists(record.path)) ? "present" : "missing",
      stale: isStale(record.lastUsed, now, STALE_AFTER_MS),
    })),
  )
  return { experiments, projects, scratches }
}

/** Tables of every tracked item with freshness and working-tree status. */
export const runListCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 0 })
  const workspace = await loadWorkspace(ctx)
  const now = ctx.now()
  const listing = await collectListing(workspace.state, now)

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: ctx.command,
          status: "ok",
          repoRoot: null,
          details: listing,
        }),
      ),
    )
    return EXIT_CODE.OK
  }

  const { experiments, projects, scratches } = listing
  if (experiments.length === 0 && projects.length === 0 && scratches.length === 0) {
    ctx.ui.info("No active experiments, projects, or scratch folders")
    ctx.ui.detail(`Create one with: ${APP_NAME} exp <name>`)
    ctx.ui.detail(`Or for no-git: ${APP_NAME} scratch <name>`)
    return EXIT_CODE.OK
  }

  const theme = ctx.ui.theme
  const nameCell = (name: string, stale: boolean): string => {
    return stale ? `${theme.name(name)}${theme.warn(STALE_MARKER)}` : theme.name(name)
  }
  const ageCell = (lastUsed: string): string => theme.muted(formatAge(new Date(lastUsed), now))

  const sections: string[][] = []
  if (experiments.length > 0) {
    sections.push([
      "Experiments:",
      ...renderTable(
        [
          headerRow(theme, ["name", "repo", "branch", "status", "age", "ticket"]),
          ...experiments.map((entry) => [
            nameCell(entry.name, entry.stale),
            basename(entry.repo),
            entry.branch,
            colorStatus(theme, entry.status),
            ageCell(entry.lastUsed),
            entry.ticket ?? "-",
          ]),
        ],
        theme,
      ),
    ])
  }
  if (projects.length > 0) {
    sections.push([
      "Projects:",
      ...renderTable(
        [
          headerRow(theme, ["name", "branch", "repos", "age"]),
          ...projects.map((entry) => [
            nameCell(entry.name, entry.stale),
            entry.branch,
            entry.repos.map((repo) => repo.name).join(", "),
            ageCell(entry.lastUsed),
          ]),
        ],
        theme,
      ),
    ])
  }
  if (scratches.length > 0) {
    sections.push([
      "Scratch:",
      ...renderTable(
        [
          headerRow(theme, ["name", "age", "ticket"]),
          ...scratches.map((entry) => [nameCell(entry.name, entry.stale), ageCell(entry.lastUsed), entry.ticket ?? "-"]),
        ],
        theme,
      ),
    ])
  }

  sections.forEach(([title, ...lines], index) => {
    if (index > 0) {
      ctx.ui.blank()
    }
    ctx.ui.header(title ?? "")
    for (const line of lines) {
      ctx.ui.line(line)
    }
  })
  return EXIT_CODE.OK
}
