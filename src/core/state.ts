import { readFile } from "node:fs/promises"
import { STATE_VERSION } from "./constants"
import { createCliError } from "./errors"
import { getOwn, isJsonObject, isMissingFileError, writeJsonAtomically } from "./json-storage"
import { experimentKey, WORKSPACE_KINDS, type WorkspaceKind } from "./names"

export type ExperimentRecord = {
  readonly name: string
  readonly repo: string
  readonly path: string
  readonly branch: string
  readonly ticket?: string
  readonly kind: WorkspaceKind
  readonly created: string
  readonly lastUsed: string
}

export type ProjectRepo = {
  readonly name: string
  readonly source: string
}

export type ProjectRecord = {
  readonly name: string
  readonly path: string
  readonly branch: string
  readonly repos: ReadonlyArray<ProjectRepo>
  readonly created: string
  readonly lastUsed: string
}

export type ScratchRecord = {
  readonly name: string
  readonly path: string
  readonly ticket?: string
  readonly created: string
  readonly lastUsed: string
}

export type GroveState = {
  readonly version: typeof STATE_VERSION
  readonly experiments: Readonly<Record<string, ExperimentRecord>>
  readonly projects: Readonly<Record<string, ProjectRecord>>
  readonly scratches: Readonly<Record<string, ScratchRecord>>
}

export type TrackedItem =
  | { readonly type: "experiment"; readonly key: string; readonly record: ExperimentRecord }
  | { readonly type: "project"; readonly key: string; readonly record: ProjectRecord }
  | { readonly type: "scratch"; readonly key: string; readonly record: ScratchRecord }

export type TrackedItemType = TrackedItem["type"]

export const createEmptyState = (): GroveState => {
  return {
    version: STATE_VERSION,
    experiments: {},
    projects: {},
    scratches: {},
  }
}

const throwInvalidState = (file: string, keyPath: readonly string[], reason: string): never => {
  const joined = keyPath.length === 0 ? "<root>" : keyPath.join(".")
  throw createCliError("INVALID_STATE", {
    message: `Invalid state: ${file} (${joined}: ${reason})`,
    details: { file, keyPath: joined, reason },
  })
}

type RecordReader = {
  readonly string: (key: string) => string
  readonly optionalString: (key: string) => string | undefined
  readonly value: (key: string) => unknown
  readonly keyPath: readonly string[]
}

const createRecordReader = (file: string, value: unknown, keyPath: readonly string[]): RecordReader => {
  if (!isJsonObject(value)) {
    return throwInvalidState(file, keyPath, "must be an object")
  }
  const record = value
  return {
    keyPath,
    value: (key) => record[key],
    string: (key) => {
      const field = record[key]
      if (typeof field !== "string") {
        return throwInvalidState(file, [...keyPath, key], "must be a string")
      }
      return field
    },
    optionalString: (key) => {
      const field = record[key]
      if (field === undefined || field === null || field === "") {
        return undefined
      }
      if (typeof field !== "string") {
        return throwInvalidState(file, [...keyPath, key], "must be a string")
      }
      return field
    },
  }
}

const withTicket = (ticket: string | undefined): { readonly ticket?: string } => {
  return ticket === undefined ? {} : { ticket }
}

const parseExperiment = (file: string, value: unknown, keyPath: readonly string[]): ExperimentRecord => {
  const reader = createRecordReader(file, value, keyPath)
  const rawKind = reader.value("kind")
  const kind = rawKind === undefined ? "experiment" : WORKSPACE_KINDS.find((candidate) => candidate === rawKind)
  if (kind === undefined) {
    return throwInvalidState(file, [...keyPath, "kind"], `must be one of: ${WORKSPACE_KINDS.join(", ")}`)
  }
  return {
    name: reader.string("name"),
    repo: reader.string("repo"),
    path: reader.string("path"),
    branch: reader.string("branch"),
    ...withTicket(reader.optionalString("ticket")),
    kind,
    created: reader.string("created"),
    lastUsed: reader.string("lastUsed"),
  }
}

const parseProject = (file: string, value: unknown, keyPath: readonly string[]): ProjectRecord => {
  const reader = createRecordReader(file, value, keyPath)
  const rawRepos = reader.value("repos")
  if (!Array.isArray(rawRepos)) {
    return throwInvalidState(file, [...keyPath, "repos"], "must be an array")
  }
  const entries: unknown[] = rawRepos
  return {
    name: reader.string("name"),
    path: reader.string("path"),
    branch: reader.string("branch"),
    repos: entries.map((entry, index) => {
      const repoReader = createRecordReader(file, entry, [...keyPath, "repos", String(index)])
      return { name: repoReader.string("name"), source: repoReader.string("source") }
    }),
    created: reader.string("created"),
    lastUsed: reader.string("lastUsed"),
  }
}

const parseScratch = (file: string, value: unknown, keyPath: readonly string[]): ScratchRecord => {
  const reader = createRecordReader(file, value, keyPath)
  return {
    name: reader.string("name"),
    path: reader.string("path"),
    ...withTicket(reader.optionalString("ticket")),
    created: reader.string("created"),
    lastUsed: reader.string("lastUsed"),
  }
}

const parseRecordMap = <T>(
  file: string,
  value: unknown,
  key: string,
  parse: (file: string, value: unknown, keyPath: readonly string[]) => T,
): Record<string, T> => {
  if (value === undefined || value === null) {
    return {}
  }
  if (!isJsonObject(value)) {
    return throwInvalidState(file, [key], "must be an object")
  }
  const result: Record<string, T> = {}
  for (const [entryKey, entry] of Object.entries(value)) {
    result[entryKey] = parse(file, entry, [key, entryKey])
  }
  return result
}

export const parseState = (file: string, content: string): GroveState => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return throwInvalidState(file, [], message)
  }
  if (!isJsonObject(parsed)) {
    return throwInvalidState(file, [], "must be an object")
  }
  return {
    version: STATE_VERSION,
    experiments: parseRecordMap(file, parsed.experiments, "experiments", parseExperiment),
    projects: parseRecordMap(file, parsed.projects, "projects", parseProject),
    scratches: parseRecordMap(file, parsed.scratches, "scratches", parseScratch),
  }
}

export const loadState = async (file: string): Promise<GroveState> => {
  let content: string
  try {
    content = await readFile(file, "utf8")
  } catch (error) {
    if (isMissingFileError(error)) {
      return createEmptyState()
    }
    throw error
  }
  return parseState(file, content)
}

export const saveState = async (file: string, state: GroveState): Promise<void> => {
  await writeJsonAtomically({ filePath: file, payload: state, ensureDir: true })
}

const omitKey = <T>(record: Readonly<Record<string, T>>, key: string): Record<string, T> => {
  const { [key]: _removed, ...rest } = record
  return rest
}

export const addExperiment = (state: GroveState, record: ExperimentRecord): GroveState => {
  return {
    ...state,
    experiments: { ...state.experiments, [experimentKey(record.repo, record.name)]: record },
  }
}

export const removeExperiment = (state: GroveState, key: string): GroveState => {
  return { ...state, experiments: omitKey(state.experiments, key) }
}

export const addProject = (state: GroveState, record: ProjectRecord): GroveState => {
  return { ...state, projects: { ...state.projects, [record.name]: record } }
}

export const removeProject = (state: GroveState, name: string): GroveState => {
  return { ...state, projects: omitKey(state.projects, name) }
}

export const addScratch = (state: GroveState, record: ScratchRecord): GroveState => {
  return { ...state, scratches: { ...state.scratches, [record.name]: record } }
}

export const removeScratch = (state: GroveState, name: string): GroveState => {
  return { ...state, scratches: omitKey(state.scratches, name) }
}

/** Sets `lastUsed` on the tracked item; unknown keys leave the state as it is. */
export const touchItem = (state: GroveState, type: TrackedItemType, key: string, now: Date): GroveState => {
  const lastUsed = now.toISOString()
  switch (type) {
    case "experiment": {
      const record = getOwn(state.experiments, key)
      return record === undefined
        ? state
        : { ...state, experiments: { ...state.experiments, [key]: { ...record, lastUsed } } }
    }
    case "project": {
      const record = getOwn(state.projects, key)
      return record === undefined ? state : { ...state, projects: { ...state.projects, [key]: { ...record, lastUsed } } }
    }
    case "scratch": {
      const record = getOwn(state.scratches, key)
      return record === undefined
        ? state
        : { ...state, scratches: { ...state.scratches, [key]: { ...record, lastUsed } } }
    }
  }
}

export const removeItem = (state: GroveState, item: TrackedItem): GroveState => {
  switch (item.type) {
    case "experiment":
      return removeExperiment(state, item.key)
    case "project":
      return removeProject(state, item.key)
    case "scratch":
      return removeScratch(state, item.key)
  }
}

const compareByLastUsedDesc = (left: TrackedItem, right: TrackedItem): number => {
  const diff = Date.parse(right.record.lastUsed) - Date.parse(left.record.lastUsed)
  if (Number.isNaN(diff) || diff === 0) {
    return left.key.localeCompare(right.key)
  }
  return diff
}

export const listResumeTargets = (state: GroveState): TrackedItem[] => {
  const items: TrackedItem[] = [
    ...Object.entries(state.experiments).map(([key, record]): TrackedItem => ({ type: "experiment", key, record })),
    ...Object.entries(state.projects).map(([key, record]): TrackedItem => ({ type: "project", key, record })),
    ...Object.entries(state.scratches).map(([key, record]): TrackedItem => ({ type: "scratch", key, record })),
  ]
  return items.sort(compareByLastUsedDesc)
}

/**
 * Looks an experiment up by its state key or by its short name. When several
 * repositories hold an experiment of the same name, the most recently used wins.
 */
export const findExperimentByName = (
  state: GroveState,
  name: string,
): { readonly key: string; readonly record: ExperimentRecord } | undefined => {
  const direct = getOwn(state.experiments, name)
  if (direct !== undefined) {
    return { key: name, record: direct }
  }
  const matches = Object.entries(state.experiments)
    .filter(([, record]) => record.name === name)
    .sort(([, left], [, right]) => Date.parse(right.lastUsed) - Date.parse(left.lastUsed))
  const first = matches[0]
  return first === undefined ? undefined : { key: first[0], record: first[1] }
}

/** Finds any tracked item by name: experiments first, then projects, then scratches. */
export const findTrackedItem = (state: GroveState, name: string): TrackedItem | undefined => {
  const experiment = findExperimentByName(state, name)
  if (experiment !== undefined) {
    return { type: "experiment", ...experiment }
  }
  const project = getOwn(state.projects, name)
  if (project !== undefined) {
    return { type: "project", key: name, record: project }
  }
  const scratch = getOwn(state.scratches, name)
  if (scratch !== undefined) {
    return { type: "scratch", key: name, record: scratch }
  }
  return undefined
}
