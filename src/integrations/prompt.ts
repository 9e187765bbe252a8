import { confirm, input, select } from "@inquirer/prompts"
import { createCliError } from "../core/errors"

export type InputOptions = {
  readonly message: string
  readonly default?: string
}

export type ConfirmOptions = {
  readonly message: string
  readonly default?: boolean
}

export type SelectChoice<T> = {
  readonly name: string
  readonly value: T
  readonly description?: string
}

export type SelectOptions<T> = {
  readonly message: string
  readonly choices: ReadonlyArray<SelectChoice<T>>
}

export type Prompter = {
  input: (options: InputOptions) => Promise<string>
  confirm: (options: ConfirmOptions) => Promise<boolean>
  select: <T>(options: SelectOptions<T>) => Promise<T>
}

const isPromptAbort = (error: unknown): boolean => {
  return error instanceof Error && (error.name === "ExitPromptError" || error.name === "AbortPromptError")
}

const withCancellation = async <T>(run: () => Promise<T>): Promise<T> => {
  try {
    return await run()
  } catch (error) {
    if (isPromptAbort(error)) {
      throw createCliError("CANCELLED", { message: "Cancelled", cause: error })
    }
    throw error
  }
}

/**
 * Terminal prompts. `output` lets commands whose stdout is machine-read
 * (such as `open`) draw their pickers on stderr.
 */
export const createInquirerPrompter = ({
  output = process.stdout,
}: { readonly output?: NodeJS.WritableStream } = {}): Prompter => {
  const context = { output }
  return {
    input: ({ message, default: defaultValue }) =>
      withCancellation(async () => {
        const answer = await input({ message, default: defaultValue }, context)
        return answer.trim()
      }),
    confirm: ({ message, default: defaultValue }) =>
      withCancellation(() => confirm({ message, default: defaultValue }, context)),
    select: <T>({ message, choices }: SelectOptions<T>) =>
      withCancellation(() =>
        select<T>(
          {
            message,
            choices: choices.map((choice) => ({
              name: choice.name,
              value: choice.value,
              description: choice.description,
            })),
          },
          context,
        ),
      ),
  }
}

/** Answers with defaults and refuses anything that needs a human. */
export const createNonInteractivePrompter = (): Prompter => {
  const requireInteraction = (message: string): never => {
    throw createCliError("INTERACTIVE_REQUIRED", {
      message: `Interactive terminal required: ${message}`,
      details: { prompt: message },
    })
  }
  return {
    input: async ({ message, default: defaultValue }) => {
      return defaultValue ?? requireInteraction(message)
    },
    confirm: async ({ message, default: defaultValue }) => {
      return defaultValue ?? requireInteraction(message)
    },
    select: async <T>({ message }: SelectOptions<T>): Promise<T> => {
      return requireInteraction(message)
    },
  }
}
