import { describe, expect, it } from "vitest"
import { createUi } from "./ui"

describe("createUi", () => {
  it("prefixes messages with status symbols", () => {
    const lines: string[] = []
    const ui = createUi({ write: (line) => lines.push(line), color: false })

    ui.success("created")
    ui.info("fetching")
    ui.warn("dirty")
    ui.error("failed")
    ui.header("Experiments:")
    ui.detail("hint")
    ui.keyValue("Path", "/tmp/x")
    ui.blank()

    expect(lines).toEqual(["✓ created", "→ fetching", "⚠ dirty", "✗ failed", "Experiments:", "  hint", "  Path: /tmp/x", ""])
  })

  it("colors output when enabled", () => {
    const lines: string[] = []
    createUi({ write: (line) => lines.push(line), color: true }).success("ok")

    expect(lines[0]).not.toBe("✓ ok")
    expect(lines[0]).toContain("ok")
  })
})
