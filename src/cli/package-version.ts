import type { createRequire } from "node:module"
import { isJsonObject } from "../core/json-storage"

type RequireLike = ReturnType<typeof createRequire>

// src/cli when run from sources, dist when bundled
const CANDIDATE_PATHS = ["../package.json", "../../package.json"] as const

const isModuleNotFoundError = (error: unknown): error is Error => {
  return error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND"
}

const readVersion = (candidatePath: string, manifest: unknown): string => {
  if (!isJsonObject(manifest) || typeof manifest.version !== "string") {
    throw new Error(`package.json has no version: ${candidatePath}`)
  }
  return manifest.version
}

export const loadPackageVersion = (requireFn: RequireLike): string => {
  let lastNotFound: Error | undefined

  for (const candidatePath of CANDIDATE_PATHS) {
    let manifest: unknown
    try {
      manifest = requireFn(candidatePath)
    } catch (error) {
      if (isModuleNotFoundError(error)) {
        lastNotFound = error
        continue
      }
      throw error
    }
    return readVersion(candidatePath, manifest)
  }

  throw lastNotFound ?? new Error(`Unable to resolve package version from candidates: ${CANDIDATE_PATHS.join(", ")}`)
}
