export const SCHEMA_VERSION = 1
export const STATE_VERSION = 1

export const APP_NAME = "grove"

export const EXIT_CODE = {
  OK: 0,
  NOT_GIT_REPOSITORY: 2,
  INVALID_ARGUMENT: 3,
  SAFETY_REJECTED: 4,
  DEPENDENCY_MISSING: 5,
  NOT_FOUND: 6,
  GIT_COMMAND_FAILED: 20,
  CHILD_PROCESS_FAILED: 21,
  INTERNAL_ERROR: 30,
  CANCELLED: 130,
} as const

export const COMMAND_NAMES = {
  EXP: "exp",
  FEAT: "feat",
  SCRATCH: "scratch",
  PROJECT: "project",
  RESUME: "resume",
  CLEANUP: "cleanup",
  LIST: "list",
  STATUS: "status",
  REPO: "repo",
  INIT: "init",
  INJECT_CONTEXT: "inject-context",
  OPEN: "open",
} as const

export const METADATA_FILE_NAME = ".grove.json"
export const PROJECT_METADATA_FILE_NAME = ".grove-project.json"
export const REPO_OVERRIDES_FILE_NAME = ".grove.yml"
export const DROPBAG_FILE_NAME = "DROPBAG.md"
export const TICKET_FILE_NAME = "TICKET.md"

export const DEFAULT_REMOTE = "origin"
export const STALE_AFTER_MS = 7 * 24 * 60 * 60 * 1000
