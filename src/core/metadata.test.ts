import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { readProjectMetadata, readWorkspaceMetadata, writeProjectMetadata, writeWorkspaceMetadata } from "./metadata"

const tempDirs = new Set<string>()

const createTempDir = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "grove-metadata-"))
  tempDirs.add(dir)
  return dir
}

afterEach(async () => {
  await Promise.all([...tempDirs].map((dir) => rm(dir, { recursive: true, force: true })))
  tempDirs.clear()
})

describe("workspace metadata", () => {
  it("round-trips the workspace file", async () => {
    const dir = await createTempDir()
    const metadata = {
      type: "feature",
      name: "abc-12-login",
      ticket: "ABC-12",
      repo: "/src/api",
      created: "2026-01-01T00:00:00.000Z",
    } as const

    await writeWorkspaceMetadata(dir, metadata)

    await expect(readWorkspaceMetadata(dir)).resolves.toEqual(metadata)
  })

  it("returns null for missing or malformed files", async () => {
    const dir = await createTempDir()
    await expect(readWorkspaceMetadata(dir)).resolves.toBeNull()

    await writeFile(join(dir, ".grove.json"), JSON.stringify({ type: "other", name: "x", created: "" }), "utf8")
    await expect(readWorkspaceMetadata(dir)).resolves.toBeNull()

    await writeFile(join(dir, ".grove.json"), "not json", "utf8")
    await expect(readWorkspaceMetadata(dir)).resolves.toBeNull()
  })
})

describe("project metadata", () => {
  it("round-trips the project file", async () => {
    const dir = await createTempDir()
    const metadata = {
      name: "checkout",
      branch: "feat/checkout",
      repos: [{ name: "api", source: "/src/api" }],
      created: "2026-01-01T00:00:00.000Z",
    }

    await writeProjectMetadata(dir, metadata)

    await expect(readProjectMetadata(dir)).resolves.toEqual(metadata)
  })

  it("rejects repos without a source", async () => {
    const dir = await createTempDir()
    await writeFile(
      join(dir, ".grove-project.json"),
      JSON.stringify({ name: "checkout", branch: "b", repos: [{ name: "api" }], created: "" }),
      "utf8",
    )

    await expect(readProjectMetadata(dir)).resolves.toBeNull()
  })
})
