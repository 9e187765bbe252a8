import { basename, join } from "node:path"
import { TICKET_FILE_NAME } from "../core/constants"
import { readWorkspaceMetadata, type WorkspaceMetadata } from "../core/metadata"
import { pathExists } from "../core/paths"
import { getCurrentBranch } from "../git/branch"
import { getRecentCommits, getStatus, type GitStatus } from "../git/status"
import { createLogger } from "../utils/logger"
import { readDropbag, type DropbagInfo } from "./dropbag"
import { findTodos, type TodoItem } from "./todos"

const RECENT_COMMIT_COUNT = 5
const MAX_TODOS = 10

const logger = createLogger({ prefix: "[context]" })

export type SessionContext = {
  readonly repoName: string
  readonly branch: string | null
  readonly dropbag: DropbagInfo | null
  readonly status: GitStatus | null
  readonly commits: ReadonlyArray<string>
  readonly todos: ReadonlyArray<TodoItem>
  readonly metadata: WorkspaceMetadata | null
  readonly ticketFileExists: boolean
}

const bestEffort = async <T>(label: string, task: Promise<T>, fallback: T): Promise<T> => {
  try {
    return await task
  } catch (error) {
    logger.debug(`${label} unavailable: ${error instanceof Error ? error.message : String(error)}`)
    return fallback
  }
}

export const gatherContext = async (dir: string, now: Date = new Date()): Promise<SessionContext> => {
  const [branch, dropbag, status, commits, todos, metadata, ticketFileExists] = await Promise.all([
    bestEffort("branch", getCurrentBranch(dir), null),
    bestEffort("dropbag", readDropbag(dir, now), null),
    bestEffort("status", getStatus(dir), null),
    bestEffort("commits", getRecentCommits(dir, RECENT_COMMIT_COUNT), []),
    bestEffort("todos", findTodos(dir, MAX_TODOS), []),
    bestEffort("metadata", readWorkspaceMetadata(dir), null),
    pathExists(join(dir, TICKET_FILE_NAME)),
  ])
  return {
    repoName: basename(dir),
    branch,
    dropbag,
    status,
    commits,
    todos,
    metadata,
    ticketFileExists,
  }
}
