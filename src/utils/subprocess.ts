export type ProcessFailure = {
  readonly code: string | undefined
  readonly exitCode: number | undefined
  readonly stdout: string
  readonly stderr: string
  readonly shortMessage: string
}

/** Reads the fields execa attaches to a failed subprocess without trusting their types. */
export const readProcessFailure = (error: unknown): ProcessFailure => {
  if (error instanceof Error) {
    const fields: Record<string, unknown> = { ...error }
    return {
      code: typeof fields.code === "string" ? fields.code : undefined,
      exitCode: typeof fields.exitCode === "number" ? fields.exitCode : undefined,
      stdout: typeof fields.stdout === "string" ? fields.stdout : "",
      stderr: typeof fields.stderr === "string" ? fields.stderr : "",
      shortMessage: typeof fields.shortMessage === "string" ? fields.shortMessage : error.message,
    }
  }
  return {
    code: undefined,
    exitCode: undefined,
    stdout: "",
    stderr: "",
    shortMessage: String(error),
  }
}
