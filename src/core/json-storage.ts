import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

let atomicWriteSequence = 0

const nextAtomicWriteSuffix = (): string => {
  atomicWriteSequence += 1
  return `${String(process.pid)}-${process.hrtime.bigint().toString(36)}-${String(atomicWriteSequence)}`
}

export type ParsedJsonRecord<T> = {
  readonly valid: boolean
  readonly record: T | null
}

export type JsonRecordValidator<T> = (candidate: unknown) => candidate is T

export const isJsonObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && Array.isArray(value) !== true
}

/** Reads `key` only when it is an own property, so names like `constructor` never hit the prototype. */
export const getOwn = <T>(record: Readonly<Record<string, T>>, key: string): T | undefined => {
  return Object.hasOwn(record, key) ? record[key] : undefined
}

export const parseJsonRecord = <T>({
  content,
  validate,
}: {
  readonly content: string
  readonly validate: JsonRecordValidator<T>
}): ParsedJsonRecord<T> => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch {
    return {
      valid: false,
      record: null,
    }
  }
  if (!validate(parsed)) {
    return {
      valid: false,
      record: null,
    }
  }
  return {
    valid: true,
    record: parsed,
  }
}

export const readJsonRecord = async <T>({
  path,
  validate,
}: {
  readonly path: string
  readonly validate: JsonRecordValidator<T>
}): Promise<ParsedJsonRecord<T> & { readonly path: string; readonly exists: boolean }> => {
  let content: string
  try {
    content = await readFile(path, "utf8")
  } catch (error) {
    if (isMissingFileError(error)) {
      return {
        path,
        exists: false,
        valid: true,
        record: null,
      }
    }
    throw error
  }
  return {
    path,
    exists: true,
    ...parseJsonRecord({ content, validate }),
  }
}

export const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export const writeJsonAtomically = async ({
  filePath,
  payload,
  ensureDir = false,
}: {
  readonly filePath: string
  readonly payload: object
  readonly ensureDir?: boolean
}): Promise<void> => {
  if (ensureDir) {
    await mkdir(dirname(filePath), { recursive: true })
  }
  const tmpPath = `${filePath}.tmp-${nextAtomicWriteSuffix()}`
  try {
    await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8")
    await rename(tmpPath, filePath)
  } catch (error) {
    await rm(tmpPath, { force: true }).catch(() => undefined)
    throw error
  }
}
