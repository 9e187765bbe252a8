import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { execa } from "execa"
import type { AgentCommand } from "../integrations/agent"
import type { EditorLaunch } from "../integrations/editor"
import type { Launcher } from "../integrations/launcher"
import type { Prompter, SelectOptions } from "../integrations/prompt"

export type ScriptedAnswer =
  | { readonly input: string }
  | { readonly confirm: boolean }
  /** Picks the first choice whose label starts with this text. */
  | { readonly select: string }

export type ScriptedPrompter = Prompter & {
  readonly asked: string[]
  readonly remaining: () => number
}

/** Answers prompts in order and fails loudly on any prompt it was not told about. */
export const createScriptedPrompter = (answers: readonly ScriptedAnswer[]): ScriptedPrompter => {
  const queue = [...answers]
  const asked: string[] = []

  const next = (kind: string, message: string): ScriptedAnswer => {
    asked.push(message)
    const answer = queue.shift()
    if (answer === undefined) {
      throw new Error(`unexpected ${kind} prompt: ${message}`)
    }
    return answer
  }

  return {
    asked,
    remaining: () => queue.length,
    input: async ({ message }) => {
      const answer = next("input", message)
      if (!("input" in answer)) {
        throw new Error(`expected input answer for: ${message}`)
      }
      return answer.input
    },
    confirm: async ({ message }) => {
      const answer = next("confirm", message)
      if (!("confirm" in answer)) {
        throw new Error(`expected confirm answer for: ${message}`)
      }
      return answer.confirm
    },
    select: async <T>({ message, choices }: SelectOptions<T>): Promise<T> => {
      const answer = next("select", message)
      if (!("select" in answer)) {
        throw new Error(`expected select answer for: ${message}`)
      }
      const choice = choices.find((candidate) => candidate.name.startsWith(answer.select))
      if (choice === undefined) {
        throw new Error(`no choice starting with '${answer.select}' in: ${choices.map((candidate) => candidate.name).join(", ")}`)
      }
      return choice.value
    },
  }
}

export type RecordingLauncher = Launcher & {
  readonly agents: AgentCommand[]
  readonly editors: EditorLaunch[]
}

export const createRecordingLauncher = (): RecordingLauncher => {
  const agents: AgentCommand[] = []
  const editors: EditorLaunch[] = []
  return {
    agents,
    editors,
    runAgent: async (command) => {
      agents.push(command)
    },
    openEditor: async (launch) => {
      editors.push(launch)
    },
  }
}

export const runGit = async (cwd: string, args: readonly string[]): Promise<string> => {
  const result = await execa("git", [...args], { cwd, reject: false })
  if ((result.exitCode ?? 0) !== 0) {
    throw new Error(`git failed in ${cwd}: git ${args.join(" ")}\n${result.stderr}`)
  }
  return result.stdout
}

/** A repository with one commit on `main` and no remote. */
export const initGitRepo = async (repoRoot: string): Promise<void> => {
  await mkdir(repoRoot, { recursive: true })
  await runGit(repoRoot, ["init", "-b", "main"])
  await runGit(repoRoot, ["config", "user.name", "test-user"])
  await runGit(repoRoot, ["config", "user.email", "test@example.com"])
  await writeFile(join(repoRoot, "README.md"), "# test\n", "utf8")
  await runGit(repoRoot, ["add", "."])
  await runGit(repoRoot, ["commit", "-m", "initial"])
}
