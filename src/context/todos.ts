import type { Dirent } from "node:fs"
import { readdir, readFile } from "node:fs/promises"
import { extname, join, relative } from "node:path"
import todoSettings from "./todo-extensions.json"

export type TodoItem = {
  readonly file: string
  readonly line: number
  readonly content: string
}

const TODO_PATTERN = /\b(TODO|FIXME|HACK|XXX|BUG)\b[:\s]*(.*)/i

const SCANNED_EXTENSIONS: ReadonlySet<string> = new Set(todoSettings.extensions)
const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(todoSettings.skipDirectories)

export const scanTodoLines = (content: string): Array<Omit<TodoItem, "file">> => {
  const items: Array<Omit<TodoItem, "file">> = []
  content.split(/\r?\n/).forEach((line, index) => {
    const match = TODO_PATTERN.exec(line)
    if (match !== null) {
      items.push({ line: index + 1, content: match[0].trim() })
    }
  })
  return items
}

/**
 * Walks `dir` in name order collecting TODO-style markers from source files.
 * Unreadable entries are skipped.
 */
export const findTodos = async (dir: string, max: number): Promise<TodoItem[]> => {
  const todos: TodoItem[] = []

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true }).catch((): Dirent[] => [])
    entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))
    for (const entry of entries) {
      if (todos.length >= max) {
        return
      }
      const path = join(current, entry.name)
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          await walk(path)
        }
        continue
      }
      if (!entry.isFile() || !SCANNED_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
        continue
      }
      const content = await readFile(path, "utf8").catch(() => null)
      if (content === null) {
        continue
      }
      const file = relative(dir, path)
      for (const item of scanTodoLines(content)) {
        todos.push({ file, ...item })
      }
    }
  }

  await walk(dir)
  return todos.slice(0, max)
}
