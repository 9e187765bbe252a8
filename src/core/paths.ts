import { constants as fsConstants } from "node:fs"
import { access } from "node:fs/promises"
import { isAbsolute, relative, resolve, sep } from "node:path"
import { createCliError } from "./errors"

export const ensurePathInsideRoot = ({
  rootPath,
  path,
  message = "Path is outside allowed root",
}: {
  readonly rootPath: string
  readonly path: string
  readonly message?: string
}): string => {
  const rel = relative(rootPath, path)
  if (rel === "") {
    return path
  }
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw createCliError("PATH_OUTSIDE_ROOT", {
      message,
      details: { rootPath, path },
    })
  }
  return path
}

/** Resolves a child directory name under `rootPath`, rejecting escapes like `../x`. */
export const resolveChildPath = ({
  rootPath,
  name,
  message,
}: {
  readonly rootPath: string
  readonly name: string
  readonly message?: string
}): string => {
  const target = resolve(rootPath, name)
  if (target === resolve(rootPath)) {
    throw createCliError("PATH_OUTSIDE_ROOT", {
      message: message ?? "Path must be inside the root directory",
      details: { rootPath, name },
    })
  }
  return ensurePathInsideRoot({ rootPath: resolve(rootPath), path: target, message })
}

export const resolvePathFromCwd = ({ cwd, path }: { readonly cwd: string; readonly path: string }): string => {
  if (isAbsolute(path)) {
    return resolve(path)
  }
  return resolve(cwd, path)
}

export const isPathInsideOrEqual = ({
  rootPath,
  candidatePath,
}: {
  readonly rootPath: string
  readonly candidatePath: string
}): boolean => {
  const rel = relative(rootPath, candidatePath)
  if (rel.length === 0) {
    return true
  }
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
}

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, fsConstants.F_OK)
    return true
  } catch {
    return false
  }
}
