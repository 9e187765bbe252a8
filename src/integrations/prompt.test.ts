import { beforeEach, describe, expect, it, vi } from "vitest"
import { confirm, input, select } from "@inquirer/prompts"
import { createInquirerPrompter, createNonInteractivePrompter } from "./prompt"

vi.mock("@inquirer/prompts", () => {
  return {
    input: vi.fn(),
    confirm: vi.fn(),
    select: vi.fn(),
  }
})

const mockedInput = vi.mocked(input)
const mockedConfirm = vi.mocked(confirm)
const mockedSelect = vi.mocked(select)

const abortError = (): Error => {
  const error = new Error("User force closed the prompt with SIGINT")
  error.name = "ExitPromptError"
  return error
}

beforeEach(() => {
  mockedInput.mockReset()
  mockedConfirm.mockReset()
  mockedSelect.mockReset()
})

describe("createInquirerPrompter", () => {
  it("trims input answers", async () => {
    mockedInput.mockResolvedValueOnce("  spike  ")

    await expect(createInquirerPrompter().input({ message: "Experiment name" })).resolves.toBe("spike")
  })

  it("maps a prompt abort to CANCELLED", async () => {
    mockedConfirm.mockRejectedValueOnce(abortError())

    await expect(createInquirerPrompter().confirm({ message: "Continue?" })).rejects.toMatchObject({
      code: "CANCELLED",
      exitCode: 130,
    })
  })

  it("passes other failures through", async () => {
    mockedSelect.mockRejectedValueOnce(new Error("stream closed"))

    await expect(
      createInquirerPrompter().select({ message: "Pick", choices: [{ name: "a", value: 1 }] }),
    ).rejects.toThrowError("stream closed")
  })
})

describe("createNonInteractivePrompter", () => {
  it("answers with defaults", async () => {
    const prompter = createNonInteractivePrompter()

    await expect(prompter.input({ message: "Branch name", default: "exp/spike" })).resolves.toBe("exp/spike")
    await expect(prompter.confirm({ message: "Copy .env?", default: true })).resolves.toBe(true)
  })

  it("requires a terminal when there is no default", async () => {
    const prompter = createNonInteractivePrompter()

    await expect(prompter.input({ message: "Experiment name" })).rejects.toMatchObject({
      code: "INTERACTIVE_REQUIRED",
      message: "Interactive terminal required: Experiment name",
    })
    await expect(prompter.select({ message: "Select repo", choices: [] })).rejects.toMatchObject({
      code: "INTERACTIVE_REQUIRED",
    })
  })
})
