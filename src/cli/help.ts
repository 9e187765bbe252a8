import { APP_NAME } from "../core/constants"

export type CommandHelp = {
  readonly name: string
  readonly usage: string
  readonly summary: string
  readonly details: readonly string[]
  readonly options?: readonly string[]
  readonly examples?: readonly string[]
}

const LAUNCH_OPTIONS = [
  "-o, --open <editor>: open this editor instead of the configured one (alias: -e, --editor).",
  "-a, --agent <cmd>: launch this agent instead of the configured one.",
  "--no-editor: do not open the editor.",
  "--no-agent: do not launch the agent.",
] as const

const REPO_OPTIONS = [
  "-r, --repo <name|path>: registered repository name or path.",
  "-p, --pick: choose the repository from a picker even inside a git repository.",
  "-b, --branch <branch>: branch name (skips the prompt).",
] as const

export const commandHelpEntries: readonly CommandHelp[] = [
  {
    name: "exp",
    usage: `${APP_NAME} exp [name] [-r <repo>] [-p] [-b <branch>]`,
    summary: "Create an isolated experiment worktree.",
    details: [
      "Creates experiments/<repo>-<name> on a new branch (default exp/<name>) cut from origin's default branch.",
      "Copies .claude/ and the chosen gitignored files from the source repository.",
      "Fails when the branch already exists; resume it instead.",
    ],
    options: [...REPO_OPTIONS, ...LAUNCH_OPTIONS],
    examples: [`${APP_NAME} exp try-redis`, `${APP_NAME} exp PROJ-1234 -r backend`, `${APP_NAME} exp foo --no-agent`],
  },
  {
    name: "feat",
    usage: `${APP_NAME} feat [name] [-r <repo>] [-p] [-b <branch>]`,
    summary: "Create a feature worktree you intend to merge.",
    details: ["Same as exp, with the default branch feat/<name>."],
    options: [...REPO_OPTIONS, ...LAUNCH_OPTIONS],
    examples: [`${APP_NAME} feat user-auth`],
  },
  {
    name: "scratch",
    usage: `${APP_NAME} scratch [name] [-a <agent>]`,
    summary: "Create a scratch folder without git.",
    details: ["The folder still gets .claude/ so session context works."],
    options: ["-a, --agent <cmd>: launch this agent instead of the configured one.", "--no-agent: do not launch the agent."],
    examples: [`${APP_NAME} scratch meeting-notes`],
  },
  {
    name: "project",
    usage: `${APP_NAME} project [name] [-r <repo>]... [-b <branch>] [-y] | ${APP_NAME} project add [project] [repo]`,
    summary: "Create a multi-repository workspace on one shared branch.",
    details: [
      "Each repository becomes a worktree folder under projects/<name>/.",
      "Branches are checked in every repository before anything is created.",
      "A failed worktree removes everything created so far.",
      "project add puts one more repository into an existing project.",
    ],
    options: [
      "-r, --repo <name|path>: repository to include (repeatable; skips the prompts).",
      "-b, --branch <branch>: shared branch name (default feat/<name>).",
      "-y, --yes: proceed without confirming branch warnings.",
      ...LAUNCH_OPTIONS,
    ],
    examples: [`${APP_NAME} project api-v2 -r backend -r frontend`, `${APP_NAME} project add api-v2 shared`],
  },
  {
    name: "resume",
    usage: `${APP_NAME} resume [name] [-r <repo>] [-a <agent>]`,
    summary: "Resume an experiment, project or scratch folder.",
    details: [
      "Without a name, picks from everything tracked, most recent first.",
      "An untracked name adopts the branch exp/<name> from the repository.",
      "Warns when the branch has diverged from origin.",
    ],
    options: [
      "-r, --repo <name|path>: repository used to adopt an untracked branch.",
      "-a, --agent <cmd>: launch this agent instead of the configured one.",
      "--no-agent: do not launch the agent.",
    ],
  },
  {
    name: "cleanup",
    usage: `${APP_NAME} cleanup [name] [-f]`,
    summary: "Remove a worktree, project or scratch folder.",
    details: [
      "Asks before discarding uncommitted changes and before deleting the branch.",
      "Falls back to deleting the directory when git cannot remove the worktree.",
    ],
    options: ["-f, --force: skip confirmations and delete the branch."],
  },
  {
    name: "list",
    usage: `${APP_NAME} list [--json]`,
    summary: "List experiments, projects and scratch folders.",
    details: ["Entries unused for 7 days are marked with ⚠."],
  },
  {
    name: "status",
    usage: `${APP_NAME} status [--json]`,
    summary: "Show the workspace context of the current directory.",
    details: ["Inside a grove workspace shows its metadata, context files and git status."],
  },
  {
    name: "open",
    usage: `${APP_NAME} open [name] [--json]`,
    summary: "Print the path of a tracked item.",
    details: ["The picker draws on stderr, so the command works inside $(...)."],
    examples: [`cd "$(${APP_NAME} open try-redis)"`],
  },
  {
    name: "repo",
    usage: `${APP_NAME} repo add [path] [--name <name>] | repo list [--json] | repo remove <name>`,
    summary: "Manage registered repositories.",
    details: [
      "repo add registers a git repository, or every git repository one level below a directory.",
      "repo remove clears the last used repository when it pointed there.",
    ],
    options: ["--name <name>: register the repository under this name."],
  },
  {
    name: "init",
    usage: `${APP_NAME} init [-f]`,
    summary: "Install the session hook and /drop command in the current repository.",
    details: ["Writes .claude/settings.json and .claude/commands/drop.md, and updates .gitignore."],
    options: ["-f, --force: overwrite existing files."],
  },
  {
    name: "inject-context",
    usage: `${APP_NAME} inject-context`,
    summary: "Print the session context as markdown.",
    details: ["Called by the SessionStart hook; includes DROPBAG.md, git status, commits and TODOs."],
  },
  {
    name: "help",
    usage: `${APP_NAME} help [command]`,
    summary: "Show help.",
    details: [],
  },
]

export const findCommandHelp = (commandName: string): CommandHelp | undefined => {
  return commandHelpEntries.find((entry) => entry.name === commandName)
}

export const renderGeneralHelpText = ({ version }: { readonly version: string }): string => {
  const commandList = commandHelpEntries.map((entry) => `  ${entry.name.padEnd(15)} ${entry.summary}`).join("\n")
  return [
    APP_NAME,
    "",
    "Usage:",
    `  ${APP_NAME} <command> [options]`,
    `  ${APP_NAME}                      Dashboard and action picker.`,
    "",
    `Version: ${version}`,
    "",
    "Commands:",
    commandList,
    "",
    "Global options:",
    "  --json                  Output machine-readable JSON.",
    "  --verbose               Enable verbose logs.",
    "  -h, --help              Show help.",
    "  -v, --version           Show version.",
    "",
    "Help commands:",
    `  ${APP_NAME} help`,
    `  ${APP_NAME} help <command>`,
    `  ${APP_NAME} <command> --help`,
    "",
    "Examples:",
    `  ${APP_NAME} exp try-redis`,
    `  ${APP_NAME} list`,
    `  ${APP_NAME} resume try-redis`,
    `  ${APP_NAME} cleanup try-redis`,
  ].join("\n")
}

export const renderCommandHelpText = ({ entry }: { readonly entry: CommandHelp }): string => {
  const lines = [`Command: ${entry.name}`, "", "Usage:", `  ${entry.usage}`, "", "Summary:", `  ${entry.summary}`]

  if (entry.details.length > 0) {
    lines.push("", "Details:")
    for (const detail of entry.details) {
      lines.push(`  - ${detail}`)
    }
  }

  if (entry.options !== undefined && entry.options.length > 0) {
    lines.push("", "Options:")
    for (const option of entry.options) {
      lines.push(`  - ${option}`)
    }
  }

  if (entry.examples !== undefined && entry.examples.length > 0) {
    lines.push("", "Examples:")
    for (const example of entry.examples) {
      lines.push(`  ${example}`)
    }
  }

  lines.push("", `Show all commands: ${APP_NAME} help`)
  return lines.join("\n")
}
