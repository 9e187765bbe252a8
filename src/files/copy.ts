import type { Dirent } from "node:fs"
import { copyFile, cp, mkdir, readdir, readFile } from "node:fs/promises"
import { dirname, join, posix } from "node:path"
import { AGENT_DIR_NAME } from "../core/init"
import { isMissingFileError } from "../core/json-storage"
import { pathExists } from "../core/paths"
import candidates from "./copy-candidates.json"

const CONFIG_DIR_NAME = "config"

export type CopyFailure = {
  readonly file: string
  readonly reason: string
}

export type CopyResult = {
  readonly copied: ReadonlyArray<string>
  readonly failed: ReadonlyArray<CopyFailure>
}

const readEntries = async (dir: string): Promise<Dirent[]> => {
  return readdir(dir, { withFileTypes: true }).catch((): Dirent[] => [])
}

export const parseGitignoreRules = (content: string): string[] => {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
}

/** Matches the handful of gitignore rule shapes that cover local config files. */
export const matchesGitignoreRule = (rule: string, relPath: string): boolean => {
  if (rule === relPath) {
    return true
  }
  if (rule.startsWith("*.") && relPath.endsWith(rule.slice(1))) {
    return true
  }
  if (rule.endsWith("/") && relPath.startsWith(rule)) {
    return true
  }
  if (rule.endsWith("*") && relPath.startsWith(rule.slice(0, -1))) {
    return true
  }
  return false
}

const readGitignoreRules = async (repo: string): Promise<string[]> => {
  try {
    return parseGitignoreRules(await readFile(join(repo, ".gitignore"), "utf8"))
  } catch (error) {
    if (isMissingFileError(error)) {
      return []
    }
    throw error
  }
}

/**
 * Finds local-only files in `repo` (env files, local configs) that the
 * repository's `.gitignore` excludes, so they can be copied into a worktree.
 */
export const detectGitignoredFiles = async (repo: string): Promise<string[]> => {
  const rules = await readGitignoreRules(repo)
  if (rules.length === 0) {
    return []
  }
  const isIgnored = (relPath: string): boolean => rules.some((rule) => matchesGitignoreRule(rule, relPath))

  const found = new Set<string>()
  for (const candidate of candidates.files) {
    if ((await pathExists(join(repo, candidate))) && isIgnored(candidate)) {
      found.add(candidate)
    }
  }

  for (const entry of await readEntries(repo)) {
    if (!entry.isDirectory() && entry.name.startsWith(".env") && isIgnored(entry.name)) {
      found.add(entry.name)
    }
  }

  for (const entry of await readEntries(join(repo, CONFIG_DIR_NAME))) {
    if (entry.isDirectory()) {
      continue
    }
    const lowerName = entry.name.toLowerCase()
    const relPath = posix.join(CONFIG_DIR_NAME, entry.name)
    if (candidates.configKeywords.some((keyword) => lowerName.includes(keyword)) && isIgnored(relPath)) {
      found.add(relPath)
    }
  }

  return [...found].sort()
}

export const copyFiles = async (src: string, dst: string, files: readonly string[]): Promise<CopyResult> => {
  const copied: string[] = []
  const failed: CopyFailure[] = []
  for (const file of files) {
    const target = join(dst, file)
    try {
      await mkdir(dirname(target), { recursive: true })
      await copyFile(join(src, file), target)
      copied.push(file)
    } catch (error) {
      failed.push({ file, reason: error instanceof Error ? error.message : String(error) })
    }
  }
  return { copied, failed }
}

/** Copies the agent configuration directory when the source repository has one. */
export const copyAgentDirectory = async (src: string, dst: string): Promise<boolean> => {
  const source = join(src, AGENT_DIR_NAME)
  if (!(await pathExists(source))) {
    return false
  }
  await cp(source, join(dst, AGENT_DIR_NAME), { recursive: true, force: true })
  return true
}
