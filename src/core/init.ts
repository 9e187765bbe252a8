import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { APP_NAME, DROPBAG_FILE_NAME, METADATA_FILE_NAME } from "./constants"
import { isMissingFileError } from "./json-storage"
import { pathExists } from "./paths"

const GITIGNORE_MARKER = `# ${APP_NAME}`
const GITIGNORE_ENTRIES = [DROPBAG_FILE_NAME, METADATA_FILE_NAME] as const

export const AGENT_DIR_NAME = ".claude"
export const AGENT_SETTINGS_PATH = join(AGENT_DIR_NAME, "settings.json")
export const DROP_COMMAND_PATH = join(AGENT_DIR_NAME, "commands", "drop.md")

const DROP_COMMAND_LINES = [
  `Write a ${DROPBAG_FILE_NAME} file in the repo root with the following sections:`,
  "",
  "## Summary",
  "What we accomplished this session. Be specific about changes made.",
  "",
  "## Current State",
  "What's working, what's broken, what's partially implemented.",
  "",
  "## Next Steps",
  "Exact actions to continue (be specific: file names, function names, etc.).",
  "",
  "## Key Files",
  "Files to look at first when resuming. Include line numbers if relevant.",
  "",
  "## Open Questions",
  "Anything unresolved or decisions that need to be made.",
  "",
  "---",
  "",
  `Save the file to ${DROPBAG_FILE_NAME} in the repository root, then confirm it's written.`,
] as const

export type InitResult = {
  readonly alreadyInitialized: boolean
  readonly written: ReadonlyArray<string>
}

export const buildAgentSettings = (command: string): object => {
  return {
    hooks: {
      SessionStart: [
        {
          matcher: "*",
          hooks: [{ type: "command", command: `${command} inject-context` }],
        },
      ],
    },
  }
}

export const isInitialized = async (repoRoot: string): Promise<boolean> => {
  return pathExists(join(repoRoot, AGENT_SETTINGS_PATH))
}

/** Appends the missing entries under a single marker; returns false when nothing changed. */
export const updateGitignore = async (repoRoot: string): Promise<boolean> => {
  const path = join(repoRoot, ".gitignore")
  let current = ""
  try {
    current = await readFile(path, "utf8")
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error
    }
  }

  const existingLines = new Set(current.split(/\r?\n/).map((line) => line.trim()))
  const missing = GITIGNORE_ENTRIES.filter((entry) => !existingLines.has(entry))
  if (missing.length === 0) {
    return false
  }

  const normalizedCurrent = current.length === 0 || current.endsWith("\n") ? current : `${current}\n`
  const header = existingLines.has(GITIGNORE_MARKER)
    ? ""
    : `${normalizedCurrent.length === 0 ? "" : "\n"}${GITIGNORE_MARKER}\n`
  await writeFile(path, `${normalizedCurrent}${header}${missing.join("\n")}\n`, "utf8")
  return true
}

const writeAgentFiles = async (repoRoot: string, command: string): Promise<string[]> => {
  await mkdir(join(repoRoot, AGENT_DIR_NAME, "commands"), { recursive: true })
  await writeFile(
    join(repoRoot, AGENT_SETTINGS_PATH),
    `${JSON.stringify(buildAgentSettings(command), null, 2)}\n`,
    "utf8",
  )
  await writeFile(join(repoRoot, DROP_COMMAND_PATH), `${DROP_COMMAND_LINES.join("\n")}\n`, "utf8")
  const written = [AGENT_SETTINGS_PATH, DROP_COMMAND_PATH]
  if (await updateGitignore(repoRoot)) {
    written.push(".gitignore")
  }
  return written
}

export const initializeRepository = async ({
  repoRoot,
  force = false,
  command = APP_NAME,
}: {
  readonly repoRoot: string
  readonly force?: boolean
  readonly command?: string
}): Promise<InitResult> => {
  const alreadyInitialized = await isInitialized(repoRoot)
  if (alreadyInitialized && !force) {
    return { alreadyInitialized, written: [] }
  }
  return {
    alreadyInitialized,
    written: await writeAgentFiles(repoRoot, command),
  }
}

/** Quiet variant used while preparing workspaces. Returns true when files were written. */
export const ensureRepositoryInitialized = async (
  repoRoot: string,
  command: string = APP_NAME,
): Promise<boolean> => {
  if (await isInitialized(repoRoot)) {
    return false
  }
  await writeAgentFiles(repoRoot, command)
  return true
}
