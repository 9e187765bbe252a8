import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { copyAgentDirectory, copyFiles, detectGitignoredFiles, matchesGitignoreRule, parseGitignoreRules } from "./copy"

const tempDirs = new Set<string>()

const createTempDir = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "grove-copy-"))
  tempDirs.add(dir)
  return dir
}

afterEach(async () => {
  await Promise.all([...tempDirs].map((dir) => rm(dir, { recursive: true, force: true })))
  tempDirs.clear()
})

describe("gitignore rules", () => {
  it("drops comments and blank lines", () => {
    expect(parseGitignoreRules("# env\n\n.env*\r\n  config/  \n")).toEqual([".env*", "config/"])
  })

  it.each([
    [".env", ".env", true],
    ["*.local", ".env.local", true],
    ["config/", "config/local.json", true],
    [".env*", ".env.production", true],
    [".env", ".envrc", false],
    ["*.json", "config/local.yaml", false],
  ])("rule %s against %s", (rule, relPath, expected) => {
    expect(matchesGitignoreRule(rule, relPath)).toBe(expected)
  })
})

describe("detectGitignoredFiles", () => {
  it("returns nothing without a .gitignore", async () => {
    const repo = await createTempDir()
    await writeFile(join(repo, ".env"), "TOKEN=test-secret\n", "utf8")

    await expect(detectGitignoredFiles(repo)).resolves.toEqual([])
  })

  it("finds ignored env files and local config files", async () => {
    const repo = await createTempDir()
    await mkdir(join(repo, "config"), { recursive: true })
    await writeFile(join(repo, ".gitignore"), ".env*\n.npmrc\nconfig/*.secret.json\nconfig/local.yml\n", "utf8")
    await writeFile(join(repo, ".env"), "TOKEN=test-secret\n", "utf8")
    await writeFile(join(repo, ".env.test"), "TOKEN=test-secret\n", "utf8")
    await writeFile(join(repo, ".npmrc"), "registry=http://localhost\n", "utf8")
    await writeFile(join(repo, ".yarnrc"), "", "utf8")
    await writeFile(join(repo, "config", "local.yml"), "a: 1\n", "utf8")
    await writeFile(join(repo, "config", "app.secret.json"), "{}\n", "utf8")
    await writeFile(join(repo, "config", "dev.json"), "{}\n", "utf8")

    await expect(detectGitignoredFiles(repo)).resolves.toEqual([
      ".env",
      ".env.test",
      ".npmrc",
      "config/local.yml",
    ])
  })
})

describe("copyFiles", () => {
  it("copies files into nested directories and reports failures", async () => {
    const src = await createTempDir()
    const dst = await createTempDir()
    await mkdir(join(src, "config"), { recursive: true })
    await writeFile(join(src, "config", "local.json"), '{"port":3000}\n', "utf8")

    const result = await copyFiles(src, dst, ["config/local.json", ".env"])

    expect(result.copied).toEqual(["config/local.json"])
    expect(result.failed.map((failure) => failure.file)).toEqual([".env"])
    expect(await readFile(join(dst, "config", "local.json"), "utf8")).toBe('{"port":3000}\n')
  })
})

describe("copyAgentDirectory", () => {
  it("copies .claude when present", async () => {
    const src = await createTempDir()
    const dst = await createTempDir()

    await expect(copyAgentDirectory(src, dst)).resolves.toBe(false)

    await mkdir(join(src, ".claude", "commands"), { recursive: true })
    await writeFile(join(src, ".claude", "commands", "drop.md"), "drop\n", "utf8")

    await expect(copyAgentDirectory(src, dst)).resolves.toBe(true)
    expect(await readFile(join(dst, ".claude", "commands", "drop.md"), "utf8")).toBe("drop\n")
  })
})
