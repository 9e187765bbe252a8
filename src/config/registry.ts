import { basename, resolve } from "node:path"
import { createCliError } from "../core/errors"
import { getOwn } from "../core/json-storage"
import type { GroveConfig, RepoOverrides } from "./types"

export type RegisterRepoResult =
  | { readonly status: "added"; readonly config: GroveConfig }
  | { readonly status: "existing"; readonly config: GroveConfig }

export type RegisteredRepo = {
  readonly name: string
  readonly path: string
  readonly lastUsed: boolean
}

export const listRegisteredRepos = (config: GroveConfig): RegisteredRepo[] => {
  return Object.entries(config.repos)
    .map(([name, path]) => ({ name, path, lastUsed: path === config.lastRepo }))
    .sort((a, b) => a.name.localeCompare(b.name))
}

export const findRepoNameByPath = (config: GroveConfig, repoPath: string): string | undefined => {
  const target = resolve(repoPath)
  return Object.entries(config.repos).find(([, path]) => resolve(path) === target)?.[0]
}

/**
 * Registers `repoPath` under `name` (default: its basename). Registering the
 * same path under the same name again is a no-op; reusing a name for a
 * different path fails.
 */
export const registerRepo = (
  config: GroveConfig,
  { repoPath, name = basename(repoPath) }: { readonly repoPath: string; readonly name?: string | undefined },
): RegisterRepoResult => {
  const existing = getOwn(config.repos, name)
  if (existing !== undefined) {
    if (resolve(existing) === resolve(repoPath)) {
      return { status: "existing", config }
    }
    throw createCliError("ALREADY_EXISTS", {
      message: `Repository name '${name}' is already registered for ${existing}`,
      details: { name, existing, requested: repoPath },
    })
  }
  return {
    status: "added",
    config: { ...config, repos: { ...config.repos, [name]: repoPath } },
  }
}

export const unregisterRepo = (config: GroveConfig, name: string): GroveConfig => {
  const path = getOwn(config.repos, name)
  if (path === undefined) {
    throw createCliError("REPO_NOT_FOUND", {
      message: `Repository '${name}' is not registered`,
      details: { name, available: Object.keys(config.repos) },
    })
  }
  const repos = Object.fromEntries(Object.entries(config.repos).filter(([key]) => key !== name))
  return {
    ...config,
    repos,
    lastRepo: config.lastRepo === path ? "" : config.lastRepo,
  }
}

export const withLastRepo = (config: GroveConfig, repoPath: string): GroveConfig => {
  return { ...config, lastRepo: repoPath }
}

export const withCopyFiles = (config: GroveConfig, repoPath: string, copyFiles: readonly string[]): GroveConfig => {
  return {
    ...config,
    repoSettings: { ...config.repoSettings, [repoPath]: { copyFiles: [...copyFiles] } },
  }
}

/** Saved copy-file choice for a repository: global settings first, then `.grove.yml`. */
export const resolveSavedCopyFiles = (
  config: GroveConfig,
  repoPath: string,
  overrides: RepoOverrides = {},
): ReadonlyArray<string> | undefined => {
  return getOwn(config.repoSettings, repoPath)?.copyFiles ?? overrides.copyFiles
}
