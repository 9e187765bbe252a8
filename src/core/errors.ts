import { EXIT_CODE } from "./constants"

const ERROR_EXIT_CODES = {
  NOT_GIT_REPOSITORY: EXIT_CODE.NOT_GIT_REPOSITORY,
  INVALID_ARGUMENT: EXIT_CODE.INVALID_ARGUMENT,
  INVALID_NAME: EXIT_CODE.INVALID_ARGUMENT,
  INVALID_CONFIG: EXIT_CODE.INVALID_ARGUMENT,
  INVALID_STATE: EXIT_CODE.INVALID_ARGUMENT,
  UNKNOWN_COMMAND: EXIT_CODE.INVALID_ARGUMENT,
  INTERACTIVE_REQUIRED: EXIT_CODE.INVALID_ARGUMENT,
  NO_REPOSITORIES: EXIT_CODE.INVALID_ARGUMENT,
  ALREADY_EXISTS: EXIT_CODE.SAFETY_REJECTED,
  BRANCH_ALREADY_EXISTS: EXIT_CODE.SAFETY_REJECTED,
  PATH_OUTSIDE_ROOT: EXIT_CODE.SAFETY_REJECTED,
  SAFETY_REJECTED: EXIT_CODE.SAFETY_REJECTED,
  DEPENDENCY_MISSING: EXIT_CODE.DEPENDENCY_MISSING,
  TMUX_REQUIRED: EXIT_CODE.DEPENDENCY_MISSING,
  NOT_FOUND: EXIT_CODE.NOT_FOUND,
  PATH_NOT_FOUND: EXIT_CODE.NOT_FOUND,
  BRANCH_NOT_FOUND: EXIT_CODE.NOT_FOUND,
  REPO_NOT_FOUND: EXIT_CODE.NOT_FOUND,
  GIT_COMMAND_FAILED: EXIT_CODE.GIT_COMMAND_FAILED,
  WORKTREE_CREATE_FAILED: EXIT_CODE.GIT_COMMAND_FAILED,
  CHILD_PROCESS_FAILED: EXIT_CODE.CHILD_PROCESS_FAILED,
  INTERNAL_ERROR: EXIT_CODE.INTERNAL_ERROR,
  CANCELLED: EXIT_CODE.CANCELLED,
} as const

export type ErrorCode = keyof typeof ERROR_EXIT_CODES

type CliErrorOptions = {
  readonly message: string
  readonly details?: Record<string, unknown>
  readonly cause?: unknown
}

export class CliError extends Error {
  readonly code: ErrorCode
  readonly exitCode: number
  readonly details: Record<string, unknown>

  constructor(code: ErrorCode, options: CliErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "CliError"
    this.code = code
    this.exitCode = ERROR_EXIT_CODES[code]
    this.details = options.details ?? {}
  }
}

export const createCliError = (code: ErrorCode, options: CliErrorOptions): CliError => {
  return new CliError(code, options)
}

export const isCliError = (error: unknown): error is CliError => {
  return error instanceof CliError
}

export const ensureCliError = (error: unknown): CliError => {
  if (isCliError(error)) {
    return error
  }
  if (error instanceof Error) {
    return createCliError("INTERNAL_ERROR", {
      message: error.message,
      cause: error,
    })
  }
  return createCliError("INTERNAL_ERROR", {
    message: "An unexpected error occurred",
    details: { value: String(error) },
  })
}
