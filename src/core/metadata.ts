import { join } from "node:path"
import { METADATA_FILE_NAME, PROJECT_METADATA_FILE_NAME } from "./constants"
import { isJsonObject, readJsonRecord, writeJsonAtomically } from "./json-storage"
import type { ProjectRepo } from "./state"

export const WORKSPACE_TYPES = ["experiment", "feature", "scratch"] as const

export type WorkspaceType = (typeof WORKSPACE_TYPES)[number]

export type WorkspaceMetadata = {
  readonly type: WorkspaceType
  readonly name: string
  readonly ticket?: string
  readonly repo?: string
  readonly created: string
}

export type ProjectMetadata = {
  readonly name: string
  readonly branch: string
  readonly repos: ReadonlyArray<ProjectRepo>
  readonly created: string
}

const isOptionalString = (value: unknown): boolean => {
  return value === undefined || typeof value === "string"
}

const isWorkspaceMetadata = (value: unknown): value is WorkspaceMetadata => {
  return (
    isJsonObject(value) &&
    WORKSPACE_TYPES.some((type) => type === value.type) &&
    typeof value.name === "string" &&
    isOptionalString(value.ticket) &&
    isOptionalString(value.repo) &&
    typeof value.created === "string"
  )
}

const isProjectRepo = (value: unknown): value is ProjectRepo => {
  return isJsonObject(value) && typeof value.name === "string" && typeof value.source === "string"
}

const isProjectMetadata = (value: unknown): value is ProjectMetadata => {
  return (
    isJsonObject(value) &&
    typeof value.name === "string" &&
    typeof value.branch === "string" &&
    Array.isArray(value.repos) &&
    value.repos.every(isProjectRepo) &&
    typeof value.created === "string"
  )
}

export const readWorkspaceMetadata = async (dir: string): Promise<WorkspaceMetadata | null> => {
  const result = await readJsonRecord({ path: join(dir, METADATA_FILE_NAME), validate: isWorkspaceMetadata }).catch(
    () => null,
  )
  return result?.record ?? null
}

export const writeWorkspaceMetadata = async (dir: string, metadata: WorkspaceMetadata): Promise<void> => {
  await writeJsonAtomically({ filePath: join(dir, METADATA_FILE_NAME), payload: metadata })
}

export const readProjectMetadata = async (dir: string): Promise<ProjectMetadata | null> => {
  const result = await readJsonRecord({
    path: join(dir, PROJECT_METADATA_FILE_NAME),
    validate: isProjectMetadata,
  }).catch(() => null)
  return result?.record ?? null
}

export const writeProjectMetadata = async (dir: string, metadata: ProjectMetadata): Promise<void> => {
  await writeJsonAtomically({ filePath: join(dir, PROJECT_METADATA_FILE_NAME), payload: metadata })
}
