import { beforeEach, describe, expect, it, vi } from "vitest"
import { execa } from "execa"
import { openEditor, resolveEditorLaunch } from "./editor"

vi.mock("execa", () => {
  return {
    execa: vi.fn(),
  }
})

const mockedExeca = vi.mocked(execa)

beforeEach(() => {
  mockedExeca.mockReset()
})

describe("resolveEditorLaunch", () => {
  it("returns nothing without an editor", () => {
    expect(resolveEditorLaunch({ editor: "", workdir: "/ws/x", env: {} })).toBeNull()
  })

  it.each(["cursor", "code", "zed"])("starts %s detached on the workdir", (editor) => {
    expect(resolveEditorLaunch({ editor, workdir: "/ws/x", env: {} })).toEqual({
      file: editor,
      args: ["/ws/x"],
      cwd: "/ws/x",
      detached: true,
    })
  })

  it("opens terminal editors in a tmux split", () => {
    expect(
      resolveEditorLaunch({ editor: "vim", workdir: "/ws/x", env: { TMUX: "/tmp/tmux-1/default" } }),
    ).toEqual({
      file: "tmux",
      args: ["split-window", "-h", "-c", "/ws/x", "nvim", "."],
      cwd: "/ws/x",
      detached: false,
    })
    expect(
      resolveEditorLaunch({
        editor: "nvim",
        workdir: "/ws/x",
        env: { TMUX: "/tmp/tmux-1/default" },
        splitDirection: "vertical",
      })?.args[1],
    ).toBe("-v")
  })

  it("requires tmux for terminal editors", () => {
    expect(() => resolveEditorLaunch({ editor: "neovim", workdir: "/ws/x", env: {} })).toThrowError(
      "nvim requires tmux for split view. Use --open cursor or --open code instead",
    )
  })
})

describe("openEditor", () => {
  it("waits for attached launches", async () => {
    mockedExeca.mockResolvedValueOnce({ exitCode: 0 } as Awaited<ReturnType<typeof execa>>)

    await openEditor({ file: "tmux", args: ["split-window", "-h"], cwd: "/ws/x", detached: false })

    expect(mockedExeca).toHaveBeenCalledWith("tmux", ["split-window", "-h"], { cwd: "/ws/x" })
  })
})
