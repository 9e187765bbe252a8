import { describe, expect, it } from "vitest"
import { formatContext } from "./format"
import type { SessionContext } from "./gather"

const emptyContext: SessionContext = {
  repoName: "api",
  branch: null,
  dropbag: null,
  status: null,
  commits: [],
  todos: [],
  metadata: null,
  ticketFileExists: false,
}

describe("formatContext", () => {
  it("prints only the title when nothing is known", () => {
    expect(formatContext(emptyContext)).toBe("# Session Context\n\n")
  })

  it("renders every section in order", () => {
    const output = formatContext({
      ...emptyContext,
      branch: "exp/spike",
      dropbag: { content: "## Summary\nDone.", modifiedAt: new Date(0), age: "yesterday" },
      status: {
        clean: false,
        stagedFiles: ["src/a.ts"],
        modifiedFiles: ["src/b.ts"],
        untrackedFiles: ["notes.txt"],
        uncommittedCount: 3,
      },
      commits: ["abc123 Add parser", "def456 Initial commit"],
      todos: [{ file: "src/a.ts", line: 4, content: "TODO: handle errors" }],
      metadata: { type: "experiment", name: "abc-1-spike", ticket: "ABC-1", created: "2026-01-01T00:00:00.000Z" },
    })

    expect(output).toBe(
      [
        "# Session Context",
        "",
        "## DROPBAG.md (from yesterday)",
        "",
        "## Summary",
        "Done.",
        "",
        "## Git Status",
        "",
        "On branch exp/spike",
        "",
        "Staged changes:",
        "  src/a.ts",
        "",
        "Modified files:",
        "  modified: src/b.ts",
        "",
        "Untracked files:",
        "  notes.txt",
        "",
        "## Recent Commits",
        "",
        "abc123 Add parser",
        "def456 Initial commit",
        "",
        "## Open TODOs",
        "",
        "src/a.ts:4: TODO: handle errors",
        "",
        "## Ticket",
        "",
        "ABC-1 detected. Please fetch the ticket and save it to TICKET.md for reference.",
        "",
        "",
      ].join("\n"),
    )
  })

  it("reports a clean tree and an existing ticket file", () => {
    const output = formatContext({
      ...emptyContext,
      branch: "main",
      status: { clean: true, stagedFiles: [], modifiedFiles: [], untrackedFiles: [], uncommittedCount: 0 },
      metadata: { type: "scratch", name: "abc-2", ticket: "ABC-2", created: "2026-01-01T00:00:00.000Z" },
      ticketFileExists: true,
    })

    expect(output).toBe(
      [
        "# Session Context",
        "",
        "## Git Status",
        "",
        "On branch main",
        "Working tree clean",
        "",
        "## Ticket",
        "",
        "ABC-2 detected. See TICKET.md for details.",
        "",
        "",
      ].join("\n"),
    )
  })
})
