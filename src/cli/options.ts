import type { ArgsDef } from "citty"
import { createCliError } from "../core/errors"

type OptionValueKind = "boolean" | "value"

export type OptionSpecs = {
  readonly longOptions: ReadonlyMap<string, OptionValueKind>
  readonly shortOptions: ReadonlyMap<string, OptionValueKind>
}

/** Launch switches handled before citty sees the arguments. */
export const LAUNCH_SWITCHES = ["--no-agent", "--no-editor"] as const

export type LaunchSwitch = (typeof LAUNCH_SWITCHES)[number]

export const splitRawArgsByDoubleDash = (
  args: readonly string[],
): {
  readonly beforeDoubleDash: string[]
  readonly afterDoubleDash: string[]
} => {
  const separatorIndex = args.indexOf("--")
  if (separatorIndex < 0) {
    return {
      beforeDoubleDash: [...args],
      afterDoubleDash: [],
    }
  }
  return {
    beforeDoubleDash: args.slice(0, separatorIndex),
    afterDoubleDash: args.slice(separatorIndex + 1),
  }
}

export const extractLaunchSwitches = (
  args: readonly string[],
): { readonly args: string[]; readonly switches: ReadonlySet<LaunchSwitch> } => {
  const switches = new Set<LaunchSwitch>()
  const rest: string[] = []
  for (const token of args) {
    const matched = LAUNCH_SWITCHES.find((candidate) => candidate === token)
    if (matched === undefined) {
      rest.push(token)
    } else {
      switches.add(matched)
    }
  }
  return { args: rest, switches }
}

const toKebabCase = (value: string): string => {
  return value.replace(/[A-Z]/g, (match) => `-${match.toLowerCase()}`)
}

export const buildOptionSpecs = (argsDef: Readonly<ArgsDef>): OptionSpecs => {
  const longOptions = new Map<string, OptionValueKind>()
  const shortOptions = new Map<string, OptionValueKind>()

  for (const [argName, arg] of Object.entries(argsDef)) {
    if (arg.type === "positional") {
      continue
    }

    const valueKind: OptionValueKind = arg.type === "boolean" ? "boolean" : "value"
    longOptions.set(argName, valueKind)
    longOptions.set(toKebabCase(argName), valueKind)

    const aliases =
      "alias" in arg ? (Array.isArray(arg.alias) ? arg.alias : typeof arg.alias === "string" ? [arg.alias] : []) : []

    for (const alias of aliases) {
      if (alias.length === 1) {
        shortOptions.set(alias, valueKind)
        continue
      }
      longOptions.set(alias, valueKind)
      longOptions.set(toKebabCase(alias), valueKind)
    }
  }

  return { longOptions, shortOptions }
}

export const validateRawOptions = (args: readonly string[], optionSpecs: OptionSpecs): void => {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index]
    if (token === undefined || !token.startsWith("-") || token === "-") {
      continue
    }

    if (token.startsWith("--")) {
      const value = token.slice(2)
      if (value.length === 0) {
        continue
      }

      const separatorIndex = value.indexOf("=")
      const rawOptionName = separatorIndex >= 0 ? value.slice(0, separatorIndex) : value
      const kind = optionSpecs.longOptions.get(rawOptionName)
      if (kind === undefined) {
        throw createCliError("INVALID_ARGUMENT", { message: `Unknown option: --${rawOptionName}` })
      }

      if (kind === "value") {
        if (separatorIndex >= 0) {
          if (value.slice(separatorIndex + 1).length === 0) {
            throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: --${rawOptionName}` })
          }
        } else {
          const nextToken = args[index + 1]
          if (nextToken === undefined || nextToken.length === 0 || nextToken.startsWith("-")) {
            throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: --${rawOptionName}` })
          }
          index += 1
        }
      }
      continue
    }

    const shortFlags = token.slice(1)
    for (let flagIndex = 0; flagIndex < shortFlags.length; flagIndex += 1) {
      const option = shortFlags[flagIndex]
      if (option === undefined) {
        continue
      }

      const kind = optionSpecs.shortOptions.get(option)
      if (kind === undefined) {
        throw createCliError("INVALID_ARGUMENT", { message: `Unknown option: -${option}` })
      }

      if (kind === "value") {
        if (flagIndex < shortFlags.length - 1) {
          break
        }
        const nextToken = args[index + 1]
        if (nextToken === undefined || nextToken.length === 0 || nextToken.startsWith("-")) {
          throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: -${option}` })
        }
        index += 1
        break
      }
    }
  }
}

/** Collects every value of a repeatable option, in order (`-r a --repo=b -rc`). */
export const collectOptionValues = ({
  args,
  longName,
  shortName,
}: {
  readonly args: readonly string[]
  readonly longName: string
  readonly shortName?: string
}): string[] => {
  const values: string[] = []

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index]
    if (token === undefined) {
      continue
    }

    if (token.startsWith(`--${longName}=`)) {
      values.push(token.slice(longName.length + 3))
      continue
    }

    if (token === `--${longName}` || (shortName !== undefined && token === `-${shortName}`)) {
      const nextToken = args[index + 1]
      if (nextToken !== undefined) {
        values.push(nextToken)
        index += 1
      }
      continue
    }

    if (shortName !== undefined && !token.startsWith("--") && token.startsWith(`-${shortName}`)) {
      values.push(token.slice(2))
    }
  }

  return values
}

export const getPositionals = (args: { readonly _: unknown[] }): string[] => {
  return args._.filter((value): value is string => typeof value === "string")
}

export const readStringOption = (value: unknown): string | undefined => {
  if (typeof value === "string" && value.length > 0) {
    return value
  }
  if (Array.isArray(value)) {
    const values: unknown[] = value
    const last = values.at(-1)
    return typeof last === "string" && last.length > 0 ? last : undefined
  }
  return undefined
}

export const ensureArgumentCount = ({
  command,
  args,
  min,
  max,
}: {
  readonly command: string
  readonly args: readonly string[]
  readonly min: number
  readonly max: number
}): void => {
  if (args.length < min || args.length > max) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `${command} expects ${String(min)}-${String(max)} positional argument(s), received ${String(args.length)}`,
      details: { command, args },
    })
  }
}
