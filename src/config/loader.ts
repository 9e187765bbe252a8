import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import { parse } from "yaml"
import { APP_NAME, REPO_OVERRIDES_FILE_NAME } from "../core/constants"
import { createCliError } from "../core/errors"
import { isJsonObject, isMissingFileError, writeJsonAtomically } from "../core/json-storage"
import {
  createDefaultConfig,
  TMUX_SPLIT_DIRECTIONS,
  type GroveConfig,
  type RepoOverrides,
  type RepoSettings,
  type SessionSettings,
  type TmuxSplitDirection,
} from "./types"

const CONFIG_FILE_BASENAME = "config.json"

type ValidationContext = {
  readonly file: string
}

type FieldInput = {
  readonly value: unknown
  readonly ctx: ValidationContext
  readonly keyPath: readonly string[]
}

export type LoadConfigOptions = {
  readonly env?: NodeJS.ProcessEnv
  readonly home?: string
}

export type LoadedConfig = {
  readonly path: string
  readonly config: GroveConfig
  readonly created: boolean
}

export type WorkspaceDirectories = {
  readonly baseDir: string
  readonly experiments: string
  readonly projects: string
  readonly scratch: string
  readonly stateFile: string
}

const toKeyPath = (segments: readonly string[]): string => {
  if (segments.length === 0) {
    return "<root>"
  }
  return segments.join(".")
}

const throwInvalidConfig = ({
  file,
  keyPath,
  reason,
}: {
  readonly file: string
  readonly keyPath: string
  readonly reason: string
}): never => {
  throw createCliError("INVALID_CONFIG", {
    message: `Invalid config: ${file} (${keyPath}: ${reason})`,
    details: {
      file,
      keyPath,
      reason,
    },
  })
}

const expectRecord = ({ value, ctx, keyPath }: FieldInput): Record<string, unknown> => {
  if (isJsonObject(value)) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be an object",
  })
}

const ensureNoUnknownKeys = ({
  record,
  allowedKeys,
  ctx,
  keyPath,
}: {
  readonly record: Record<string, unknown>
  readonly allowedKeys: ReadonlyArray<string>
  readonly ctx: ValidationContext
  readonly keyPath: readonly string[]
}): void => {
  const allowed = new Set(allowedKeys)
  for (const key of Object.keys(record)) {
    if (allowed.has(key)) {
      continue
    }
    throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath([...keyPath, key]),
      reason: "unknown key",
    })
  }
}

const parseBoolean = ({ value, ctx, keyPath }: FieldInput): boolean => {
  if (typeof value === "boolean") {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be boolean",
  })
}

const parseString = ({ value, ctx, keyPath }: FieldInput): string => {
  if (typeof value === "string") {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be a string",
  })
}

const parseNonEmptyString = ({ value, ctx, keyPath }: FieldInput): string => {
  if (typeof value === "string" && value.trim().length > 0) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be a non-empty string",
  })
}

const parseStringArray = ({ value, ctx, keyPath }: FieldInput): string[] => {
  if (!Array.isArray(value)) {
    return throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath(keyPath),
      reason: "must be an array",
    })
  }
  const values: unknown[] = value
  return values.map((item, index) =>
    parseNonEmptyString({ value: item, ctx, keyPath: [...keyPath, String(index)] }),
  )
}

const parseStringRecord = ({ value, ctx, keyPath }: FieldInput): Record<string, string> => {
  const record = expectRecord({ value, ctx, keyPath })
  const result: Record<string, string> = {}
  for (const [key, item] of Object.entries(record)) {
    result[key] = parseNonEmptyString({ value: item, ctx, keyPath: [...keyPath, key] })
  }
  return result
}

const parseTmuxSplitDirection = ({ value, ctx, keyPath }: FieldInput): TmuxSplitDirection => {
  const matched = TMUX_SPLIT_DIRECTIONS.find((direction) => direction === value)
  if (matched === undefined) {
    return throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath(keyPath),
      reason: `must be one of: ${TMUX_SPLIT_DIRECTIONS.join(", ")}`,
    })
  }
  return matched
}

const parseRepoSettings = ({ value, ctx, keyPath }: FieldInput): Record<string, RepoSettings> => {
  const record = expectRecord({ value, ctx, keyPath })
  const result: Record<string, RepoSettings> = {}
  for (const [repoPath, rawSettings] of Object.entries(record)) {
    const settingsPath = [...keyPath, repoPath]
    const settings = expectRecord({ value: rawSettings, ctx, keyPath: settingsPath })
    ensureNoUnknownKeys({ record: settings, allowedKeys: ["copyFiles"], ctx, keyPath: settingsPath })
    result[repoPath] = {
      copyFiles:
        settings.copyFiles === undefined
          ? []
          : parseStringArray({ value: settings.copyFiles, ctx, keyPath: [...settingsPath, "copyFiles"] }),
    }
  }
  return result
}

export const validateConfig = ({
  rawConfig,
  ctx,
  defaults,
}: {
  readonly rawConfig: unknown
  readonly ctx: ValidationContext
  readonly defaults: GroveConfig
}): GroveConfig => {
  if (rawConfig === null || rawConfig === undefined) {
    return defaults
  }
  const root = expectRecord({ value: rawConfig, ctx, keyPath: [] })
  ensureNoUnknownKeys({
    record: root,
    allowedKeys: [
      "baseDir",
      "agent",
      "agentFlags",
      "editor",
      "autoInit",
      "repos",
      "repoSettings",
      "lastRepo",
      "tmuxSplitDirection",
    ],
    ctx,
    keyPath: [],
  })

  return {
    baseDir:
      root.baseDir === undefined
        ? defaults.baseDir
        : parseNonEmptyString({ value: root.baseDir, ctx, keyPath: ["baseDir"] }),
    agent: root.agent === undefined ? defaults.agent : parseString({ value: root.agent, ctx, keyPath: ["agent"] }),
    agentFlags:
      root.agentFlags === undefined
        ? defaults.agentFlags
        : parseStringArray({ value: root.agentFlags, ctx, keyPath: ["agentFlags"] }),
    editor: root.editor === undefined ? defaults.editor : parseString({ value: root.editor, ctx, keyPath: ["editor"] }),
    autoInit:
      root.autoInit === undefined ? defaults.autoInit : parseBoolean({ value: root.autoInit, ctx, keyPath: ["autoInit"] }),
    repos: root.repos === undefined ? defaults.repos : parseStringRecord({ value: root.repos, ctx, keyPath: ["repos"] }),
    repoSettings:
      root.repoSettings === undefined
        ? defaults.repoSettings
        : parseRepoSettings({ value: root.repoSettings, ctx, keyPath: ["repoSettings"] }),
    lastRepo:
      root.lastRepo === undefined ? defaults.lastRepo : parseString({ value: root.lastRepo, ctx, keyPath: ["lastRepo"] }),
    tmuxSplitDirection:
      root.tmuxSplitDirection === undefined
        ? defaults.tmuxSplitDirection
        : parseTmuxSplitDirection({ value: root.tmuxSplitDirection, ctx, keyPath: ["tmuxSplitDirection"] }),
  }
}

export const resolveConfigPath = ({ env = process.env, home = homedir() }: LoadConfigOptions = {}): string => {
  const explicitHome = env.GROVE_CONFIG_HOME
  if (typeof explicitHome === "string" && explicitHome.length > 0) {
    return join(resolve(explicitHome), CONFIG_FILE_BASENAME)
  }
  const xdgConfigHome = env.XDG_CONFIG_HOME
  if (typeof xdgConfigHome === "string" && xdgConfigHome.length > 0) {
    return join(resolve(xdgConfigHome), APP_NAME, CONFIG_FILE_BASENAME)
  }
  return join(home, ".config", APP_NAME, CONFIG_FILE_BASENAME)
}

export const expandHomePath = (path: string, home: string = homedir()): string => {
  if (path === "~") {
    return home
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2))
  }
  return path
}

export const saveConfig = async ({ path, config }: { readonly path: string; readonly config: GroveConfig }): Promise<void> => {
  await writeJsonAtomically({ filePath: path, payload: config, ensureDir: true })
}

/**
 * Loads the global config. A missing file yields the defaults, which are
 * written back so the user has something to edit.
 */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<LoadedConfig> => {
  const home = options.home ?? homedir()
  const path = resolveConfigPath({ env: options.env, home })
  const defaults = createDefaultConfig(home)

  let content: string
  try {
    content = await readFile(path, "utf8")
  } catch (error) {
    if (isMissingFileError(error)) {
      await saveConfig({ path, config: defaults })
      return { path, config: defaults, created: true }
    }
    throw error
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return throwInvalidConfig({ file: path, keyPath: "<root>", reason: message })
  }

  return {
    path,
    config: validateConfig({ rawConfig: parsed, ctx: { file: path }, defaults }),
    created: false,
  }
}

export const resolveWorkspaceDirectories = (config: GroveConfig, home: string = homedir()): WorkspaceDirectories => {
  const baseDir = resolve(expandHomePath(config.baseDir, home))
  return {
    baseDir,
    experiments: join(baseDir, "experiments"),
    projects: join(baseDir, "projects"),
    scratch: join(baseDir, "scratch"),
    stateFile: join(baseDir, "state.json"),
  }
}

export const loadRepoOverrides = async (repoRoot: string): Promise<RepoOverrides> => {
  const file = join(repoRoot, REPO_OVERRIDES_FILE_NAME)
  let content: string
  try {
    content = await readFile(file, "utf8")
  } catch (error) {
    if (isMissingFileError(error)) {
      return {}
    }
    throw error
  }

  let parsed: unknown
  try {
    parsed = parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return throwInvalidConfig({ file, keyPath: "<root>", reason: message })
  }
  if (parsed === null || parsed === undefined) {
    return {}
  }

  const ctx = { file }
  const root = expectRecord({ value: parsed, ctx, keyPath: [] })
  ensureNoUnknownKeys({ record: root, allowedKeys: ["agent", "agentFlags", "editor", "copyFiles"], ctx, keyPath: [] })
  return {
    ...(root.agent === undefined ? {} : { agent: parseNonEmptyString({ value: root.agent, ctx, keyPath: ["agent"] }) }),
    ...(root.agentFlags === undefined
      ? {}
      : { agentFlags: parseStringArray({ value: root.agentFlags, ctx, keyPath: ["agentFlags"] }) }),
    ...(root.editor === undefined ? {} : { editor: parseString({ value: root.editor, ctx, keyPath: ["editor"] }) }),
    ...(root.copyFiles === undefined
      ? {}
      : { copyFiles: parseStringArray({ value: root.copyFiles, ctx, keyPath: ["copyFiles"] }) }),
  }
}

export const resolveSessionSettings = ({
  config,
  overrides = {},
  agent,
  editor,
}: {
  readonly config: GroveConfig
  readonly overrides?: RepoOverrides
  readonly agent?: string | undefined
  readonly editor?: string | undefined
}): SessionSettings => {
  return {
    agent: agent ?? overrides.agent ?? config.agent,
    agentFlags: overrides.agentFlags ?? config.agentFlags,
    editor: editor ?? overrides.editor ?? config.editor,
  }
}
