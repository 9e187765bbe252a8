import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { getOwn, isJsonObject, parseJsonRecord, readJsonRecord, writeJsonAtomically } from "./json-storage"

type Sample = {
  readonly name: string
}

const isSample = (candidate: unknown): candidate is Sample => {
  return isJsonObject(candidate) && typeof candidate.name === "string"
}

const tempDirs = new Set<string>()

const createTempDir = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "grove-json-"))
  tempDirs.add(dir)
  return dir
}

afterEach(async () => {
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("getOwn", () => {
  it("reads own keys only", () => {
    const record: Record<string, string> = { api: "/src/api" }

    expect(getOwn(record, "api")).toBe("/src/api")
    expect(getOwn(record, "constructor")).toBeUndefined()
    expect(getOwn(record, "toString")).toBeUndefined()
  })
})

describe("parseJsonRecord", () => {
  it("returns the record when validation passes", () => {
    expect(parseJsonRecord({ content: '{"name":"a"}', validate: isSample })).toEqual({
      valid: true,
      record: { name: "a" },
    })
  })

  it("marks malformed or mismatching content invalid", () => {
    expect(parseJsonRecord({ content: "{", validate: isSample })).toEqual({ valid: false, record: null })
    expect(parseJsonRecord({ content: '{"name":1}', validate: isSample })).toEqual({ valid: false, record: null })
  })
})

describe("readJsonRecord", () => {
  it("reports a missing file as valid and absent", async () => {
    const dir = await createTempDir()
    const result = await readJsonRecord({ path: join(dir, "missing.json"), validate: isSample })

    expect(result.exists).toBe(false)
    expect(result.valid).toBe(true)
    expect(result.record).toBeNull()
  })

  it("reads an existing file", async () => {
    const dir = await createTempDir()
    const path = join(dir, "sample.json")
    await writeFile(path, '{"name":"b"}', "utf8")

    const result = await readJsonRecord({ path, validate: isSample })
    expect(result).toEqual({ path, exists: true, valid: true, record: { name: "b" } })
  })
})

describe("writeJsonAtomically", () => {
  it("writes pretty JSON and leaves no temp file", async () => {
    const dir = await createTempDir()
    const filePath = join(dir, "nested", "out.json")

    await writeJsonAtomically({ filePath, payload: { name: "c" }, ensureDir: true })

    expect(await readFile(filePath, "utf8")).toBe('{\n  "name": "c"\n}\n')
    expect(await readdir(join(dir, "nested"))).toEqual(["out.json"])
  })
})
