import { Chalk } from "chalk"

export type Theme = {
  readonly success: (value: string) => string
  readonly info: (value: string) => string
  readonly warn: (value: string) => string
  readonly error: (value: string) => string
  readonly header: (value: string) => string
  readonly name: (value: string) => string
  readonly muted: (value: string) => string
  readonly clean: (value: string) => string
  readonly dirty: (value: string) => string
}

export type Ui = {
  readonly theme: Theme
  success: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  header: (message: string) => void
  detail: (message: string) => void
  keyValue: (key: string, value: string) => void
  line: (message: string) => void
  blank: () => void
}

const PALETTE = {
  green: "#a6e3a1",
  sky: "#89dceb",
  yellow: "#f9e2af",
  red: "#f38ba8",
  lavender: "#b4befe",
  overlay0: "#6c7086",
  peach: "#fab387",
} as const

const identity = (value: string): string => value

export const createTheme = ({ enabled }: { readonly enabled: boolean }): Theme => {
  if (enabled !== true) {
    return {
      success: identity,
      info: identity,
      warn: identity,
      error: identity,
      header: identity,
      name: identity,
      muted: identity,
      clean: identity,
      dirty: identity,
    }
  }

  const chalk = new Chalk({ level: 3 })
  const color =
    (hex: string) =>
    (value: string): string =>
      chalk.hex(hex)(value)

  return {
    success: color(PALETTE.green),
    info: color(PALETTE.sky),
    warn: color(PALETTE.yellow),
    error: color(PALETTE.red),
    header: (value) => chalk.bold(value),
    name: color(PALETTE.lavender),
    muted: color(PALETTE.overlay0),
    clean: color(PALETTE.green),
    dirty: color(PALETTE.peach),
  }
}

/** Human-facing output: one symbol-prefixed line per message. */
export const createUi = ({ write, color }: { readonly write: (line: string) => void; readonly color: boolean }): Ui => {
  const theme = createTheme({ enabled: color })
  return {
    theme,
    success: (message) => write(`${theme.success("✓")} ${message}`),
    info: (message) => write(`${theme.info("→")} ${message}`),
    warn: (message) => write(`${theme.warn("⚠")} ${message}`),
    error: (message) => write(`${theme.error("✗")} ${message}`),
    header: (message) => write(theme.header(message)),
    detail: (message) => write(`  ${message}`),
    keyValue: (key, value) => write(`  ${theme.muted(`${key}:`)} ${value}`),
    line: (message) => write(message),
    blank: () => write(""),
  }
}
