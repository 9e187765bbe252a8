import { readFile, stat } from "node:fs/promises"
import { join } from "node:path"
import { DROPBAG_FILE_NAME } from "../core/constants"
import { isMissingFileError } from "../core/json-storage"
import { formatRelativeTime } from "../utils/format"

export type DropbagInfo = {
  readonly content: string
  readonly modifiedAt: Date
  readonly age: string
}

export const readDropbag = async (dir: string, now: Date = new Date()): Promise<DropbagInfo | null> => {
  const path = join(dir, DROPBAG_FILE_NAME)
  try {
    const stats = await stat(path)
    const content = await readFile(path, "utf8")
    return {
      content: content.trim(),
      modifiedAt: stats.mtime,
      age: formatRelativeTime(stats.mtime, now),
    }
  } catch (error) {
    if (isMissingFileError(error)) {
      return null
    }
    throw error
  }
}
