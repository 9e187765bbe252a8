import { basename } from "node:path"
import { createCliError } from "./errors"

const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/
const TICKET_PATTERN = /^([A-Z]+-\d+)/

export const WORKSPACE_KINDS = ["experiment", "feature"] as const

export type WorkspaceKind = (typeof WORKSPACE_KINDS)[number]

const BRANCH_PREFIX_BY_KIND: Readonly<Record<WorkspaceKind, string>> = {
  experiment: "exp",
  feature: "feat",
}

export const isValidName = (name: string): boolean => {
  return NAME_PATTERN.test(name)
}

export const validateName = (name: string): string => {
  if (name.length === 0) {
    throw createCliError("INVALID_NAME", {
      message: "Name cannot be empty",
    })
  }
  if (isValidName(name) !== true) {
    throw createCliError("INVALID_NAME", {
      message: `Invalid name '${name}': use letters, digits, '-' or '_' and start with a letter or digit`,
      details: { name },
    })
  }
  return name
}

export const experimentKey = (repoPath: string, name: string): string => {
  return `${basename(repoPath)}-${name}`
}

export const extractTicket = (name: string): string | undefined => {
  const match = TICKET_PATTERN.exec(name.toUpperCase())
  return match?.[1]
}

export const defaultBranchName = (kind: WorkspaceKind, name: string): string => {
  return `${BRANCH_PREFIX_BY_KIND[kind]}/${name}`
}
