import { basename, join } from "node:path"
import { DROPBAG_FILE_NAME, EXIT_CODE, TICKET_FILE_NAME } from "../../core/constants"
import { isInitialized } from "../../core/init"
import { readProjectMetadata, readWorkspaceMetadata } from "../../core/metadata"
import { pathExists } from "../../core/paths"
import { getCurrentBranch } from "../../git/branch"
import { getRecentCommits, getRepoRoot, getStatus, isGitRepository, toStatusEntries } from "../../git/status"
import { ensureArgumentCount } from "../options"
import { buildJsonSuccess } from "../output"
import type { CommandContext } from "../runtime/command-context"

const STATUS_PREVIEW_LIMIT = 5
const RECENT_COMMIT_COUNT = 3

type ContextFileReport = {
  readonly agentInstructions: boolean
  readonly dropbag: boolean
  readonly ticketFile: boolean
  readonly agentSettings: boolean
}

const readContextFiles = async (dir: string): Promise<ContextFileReport> => {
  const [agentInstructions, dropbag, ticketFile, agentSettings] = await Promise.all([
    pathExists(join(dir, "CLAUDE.md")),
    pathExists(join(dir, DROPBAG_FILE_NAME)),
    pathExists(join(dir, TICKET_FILE_NAME)),
    isInitialized(dir),
  ])
  return { agentInstructions, dropbag, ticketFile, agentSettings }
}

const mark = (present: boolean): string => (present ? "✓" : "○")

/** What grove knows about the current directory: metadata, context files and git state. */
export const runStatusCommand = async (ctx: CommandContext): Promise<number> => {
  ensureArgumentCount({ command: ctx.command, args: ctx.commandArgs, min: 0, max: 0 })
  const inGit = await isGitRepository(ctx.cwd)
  const dir = inGit ? await getRepoRoot(ctx.cwd) : ctx.cwd

  const [metadata, project] = await Promise.all([readWorkspaceMetadata(dir), readProjectMetadata(dir)])
  if (!inGit && metadata === null && project === null) {
    if (ctx.options.json) {
      ctx.stdout(
        JSON.stringify(
          buildJsonSuccess({
            command: ctx.command,
            status: "ok",
            repoRoot: null,
            details: { dir, managed: false, git: false },
          }),
        ),
      )
      return EXIT_CODE.OK
    }
    ctx.ui.info("Not in a git repository")
    return EXIT_CODE.OK
  }

  const [branch, status, commits, files] = await Promise.all([
    inGit ? getCurrentBranch(dir) : Promise.resolve(null),
    inGit ? getStatus(dir) : Promise.resolve(null),
    inGit ? getRecentCommits(dir, RECENT_COMMIT_COUNT) : Promise.resolve([]),
    readContextFiles(dir),
  ])
  const entries = status === null ? [] : toStatusEntries(status)

  if (ctx.options.json) {
    ctx.stdout(
      JSON.stringify(
        buildJsonSuccess({
          command: ctx.command,
          status: "ok",
          repoRoot: inGit ? dir : null,
          details: {
            dir,
            managed: metadata !== null || project !== null,
            git: inGit,
            metadata,
            project,
            branch,
            changes: entries,
            commits,
            contextFiles: files,
          },
        }),
      ),
    )
    return EXIT_CODE.OK
  }

  if (project !== null) {
    ctx.ui.header(`Project: ${project.name}`)
    ctx.ui.keyValue("Branch", project.branch)
    ctx.ui.keyValue("Repos", project.repos.map((repo) => repo.name).join(", "))
    return EXIT_CODE.OK
  }

  if (metadata !== null) {
    const label = metadata.type.charAt(0).toUpperCase() + metadata.type.slice(1)
    ctx.ui.header(`${label}: ${metadata.name}`)
    if (metadata.repo !== undefined) {
      ctx.ui.keyValue("Repo", metadata.repo)
    }
  } else {
    ctx.ui.header(basename(dir))
  }
  if (branch !== null) {
    ctx.ui.keyValue("Branch", branch)
  }
  if (metadata !== null) {
    ctx.ui.keyValue("Type", metadata.type)
  }

  ctx.ui.blank()
  ctx.ui.header("Context Files:")
  ctx.ui.detail(`${mark(files.agentInstructions)} CLAUDE.md`)
  ctx.ui.detail(`${mark(files.dropbag)} ${DROPBAG_FILE_NAME}`)
  const ticket = metadata?.ticket
  ctx.ui.detail(
    `${mark(files.ticketFile)} ${TICKET_FILE_NAME}${ticket === undefined ? " (no ticket linked)" : ` (ticket ${ticket})`}`,
  )
  ctx.ui.detail(`${mark(files.agentSettings)} .claude/${files.agentSettings ? " (hooks configured)" : " (not initialized)"}`)

  if (!inGit) {
    return EXIT_CODE.OK
  }

  ctx.ui.blank()
  ctx.ui.header("Git Status:")
  if (entries.length === 0) {
    ctx.ui.detail("clean")
  } else {
    for (const entry of entries.slice(0, STATUS_PREVIEW_LIMIT)) {
      ctx.ui.line(`    ${entry.code} ${entry.file}`)
    }
    if (entries.length > STATUS_PREVIEW_LIMIT) {
      ctx.ui.line(`    ... and ${String(entries.length - STATUS_PREVIEW_LIMIT)} more`)
    }
  }

  if (commits.length > 0) {
    ctx.ui.blank()
    ctx.ui.header("Recent Commits:")
    for (const commit of commits) {
      ctx.ui.detail(commit)
    }
  }
  return EXIT_CODE.OK
}
