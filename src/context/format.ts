import { TICKET_FILE_NAME } from "../core/constants"
import type { SessionContext } from "./gather"

const section = (title: string, lines: readonly string[]): string => {
  return `## ${title}\n\n${lines.join("\n")}\n\n`
}

const formatStatusLines = (context: SessionContext): string[] => {
  const { status } = context
  if (status === null) {
    return []
  }
  const lines = [`On branch ${context.branch ?? "unknown"}`]
  if (status.clean) {
    lines.push("Working tree clean")
    return lines
  }
  const groups: Array<[string, readonly string[], string]> = [
    ["Staged changes:", status.stagedFiles, ""],
    ["Modified files:", status.modifiedFiles, "modified: "],
    ["Untracked files:", status.untrackedFiles, ""],
  ]
  for (const [heading, files, prefix] of groups) {
    if (files.length === 0) {
      continue
    }
    lines.push("", heading, ...files.map((file) => `  ${prefix}${file}`))
  }
  return lines
}

/** Renders the markdown injected at the start of an agent session. */
export const formatContext = (context: SessionContext): string => {
  let output = "# Session Context\n\n"

  if (context.dropbag !== null) {
    output += section(`DROPBAG.md (from ${context.dropbag.age})`, [context.dropbag.content])
  }
  if (context.status !== null) {
    output += section("Git Status", formatStatusLines(context))
  }
  if (context.commits.length > 0) {
    output += section("Recent Commits", context.commits)
  }
  if (context.todos.length > 0) {
    output += section(
      "Open TODOs",
      context.todos.map((todo) => `${todo.file}:${String(todo.line)}: ${todo.content}`),
    )
  }
  const ticket = context.metadata?.ticket
  if (ticket !== undefined && ticket.length > 0) {
    const hint = context.ticketFileExists
      ? `See ${TICKET_FILE_NAME} for details.`
      : `Please fetch the ticket and save it to ${TICKET_FILE_NAME} for reference.`
    output += section("Ticket", [`${ticket} detected. ${hint}`])
  }

  return output
}
