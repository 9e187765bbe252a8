import { SCHEMA_VERSION } from "../core/constants"
import type { CliError } from "../core/errors"

export type JsonSuccessStatus = "ok" | "created" | "existing" | "deleted"

export type JsonSuccess = {
  readonly schemaVersion: number
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly repoRoot: string | null
  readonly [key: string]: unknown
}

export const buildJsonSuccess = ({
  command,
  status,
  repoRoot,
  details,
}: {
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly repoRoot: string | null
  readonly details?: Record<string, unknown>
}): JsonSuccess => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status,
    repoRoot,
    ...(details ?? {}),
  }
}

export const buildJsonError = ({
  command,
  repoRoot,
  error,
}: {
  readonly command: string
  readonly repoRoot: string | null
  readonly error: CliError
}): Record<string, unknown> => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status: "error",
    repoRoot,
    code: error.code,
    message: error.message,
    details: error.details,
  }
}
