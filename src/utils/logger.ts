import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

type LoggerOptions = {
  readonly level?: LogLevel
  readonly prefix?: string
  readonly write?: (line: string) => void
}

export type Logger = {
  readonly level: LogLevel
  readonly prefix: string
  error: (message: string, error?: Error) => void
  warn: (message: string) => void
  info: (message: string) => void
  debug: (message: string) => void
  createChild: (suffix: string) => Logger
}

export const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean => {
  return env.GROVE_DEBUG === "true"
}

const resolveDefaultLogLevel = (): LogLevel => {
  if (isDebugEnabled()) {
    return LogLevel.DEBUG
  }
  if (process.env.GROVE_VERBOSE === "true") {
    return LogLevel.INFO
  }
  return LogLevel.WARN
}

const formatMessage = (prefix: string, message: string): string => {
  return prefix ? `${prefix} ${message}` : message
}

/**
 * Diagnostics logger. Everything goes to stderr so that commands whose
 * stdout is consumed by scripts (`open`, `inject-context`) stay clean.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? resolveDefaultLogLevel()
  const write = options.write ?? ((line: string): void => console.error(line))

  const build = (prefix: string): Logger => {
    return {
      level,
      prefix,
      error(message: string, error?: Error): void {
        write(chalk.red(formatMessage(prefix, `Error: ${message}`)))
        if (error?.stack !== undefined && isDebugEnabled()) {
          write(chalk.gray(error.stack))
        }
      },
      warn(message: string): void {
        if (level >= LogLevel.WARN) {
          write(chalk.yellow(formatMessage(prefix, message)))
        }
      },
      info(message: string): void {
        if (level >= LogLevel.INFO) {
          write(formatMessage(prefix, message))
        }
      },
      debug(message: string): void {
        if (level >= LogLevel.DEBUG) {
          write(chalk.gray(formatMessage(prefix, `[DEBUG] ${message}`)))
        }
      },
      createChild(suffix: string): Logger {
        return build(prefix ? `${prefix} ${suffix}` : suffix)
      },
    }
  }

  return build(options.prefix ?? "")
}
