export type CommandHandler = () => Promise<number>

export type CommandHandlerMap = ReadonlyMap<string, CommandHandler>

const createHandlerMap = (entries: ReadonlyArray<readonly [string, CommandHandler]>): CommandHandlerMap => {
  return new Map(entries)
}

export const dispatchCommandHandler = async ({
  command,
  handlers,
}: {
  readonly command: string
  readonly handlers: CommandHandlerMap
}): Promise<number | undefined> => {
  const handler = handlers.get(command)
  if (handler === undefined) {
    return undefined
  }
  return await handler()
}

export const createWorkspaceCommandHandlers = ({
  expHandler,
  featHandler,
  scratchHandler,
  projectHandler,
}: {
  readonly expHandler: CommandHandler
  readonly featHandler: CommandHandler
  readonly scratchHandler: CommandHandler
  readonly projectHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["exp", expHandler],
    ["feat", featHandler],
    ["scratch", scratchHandler],
    ["project", projectHandler],
  ])
}

export const createSessionCommandHandlers = ({
  resumeHandler,
  openHandler,
  cleanupHandler,
}: {
  readonly resumeHandler: CommandHandler
  readonly openHandler: CommandHandler
  readonly cleanupHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["resume", resumeHandler],
    ["open", openHandler],
    ["cleanup", cleanupHandler],
  ])
}

export const createInfoCommandHandlers = ({
  listHandler,
  statusHandler,
  injectContextHandler,
}: {
  readonly listHandler: CommandHandler
  readonly statusHandler: CommandHandler
  readonly injectContextHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["list", listHandler],
    ["status", statusHandler],
    ["inject-context", injectContextHandler],
  ])
}

export const createSetupCommandHandlers = ({
  repoHandler,
  initHandler,
}: {
  readonly repoHandler: CommandHandler
  readonly initHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["repo", repoHandler],
    ["init", initHandler],
  ])
}
