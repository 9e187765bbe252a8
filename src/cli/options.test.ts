import type { ArgsDef } from "citty"
import { describe, expect, it } from "vitest"
import {
  buildOptionSpecs,
  collectOptionValues,
  ensureArgumentCount,
  extractLaunchSwitches,
  readStringOption,
  splitRawArgsByDoubleDash,
  validateRawOptions,
} from "./options"

const argsDef = {
  command: { type: "positional", required: false },
  json: { type: "boolean" },
  repo: { type: "string", alias: "r" },
  force: { type: "boolean", alias: "f" },
  yes: { type: "boolean", alias: "y" },
} satisfies ArgsDef

const specs = buildOptionSpecs(argsDef)

describe("options", () => {
  it("splits arguments at the first double dash", () => {
    expect(splitRawArgsByDoubleDash(["exp", "a", "--", "--model", "x"])).toEqual({
      beforeDoubleDash: ["exp", "a"],
      afterDoubleDash: ["--model", "x"],
    })
    expect(splitRawArgsByDoubleDash(["list"])).toEqual({ beforeDoubleDash: ["list"], afterDoubleDash: [] })
  })

  it("pulls launch switches out of the arguments", () => {
    const { args, switches } = extractLaunchSwitches(["exp", "--no-agent", "a", "--no-editor"])

    expect(args).toEqual(["exp", "a"])
    expect([...switches]).toEqual(["--no-agent", "--no-editor"])
  })

  it("accepts known long, short and grouped flags", () => {
    expect(() => validateRawOptions(["cleanup", "x", "-fy", "--json"], specs)).not.toThrow()
    expect(() => validateRawOptions(["project", "p", "--repo=api", "-r", "web"], specs)).not.toThrow()
  })

  it("rejects unknown options", () => {
    expect(() => validateRawOptions(["list", "--bogus"], specs)).toThrowError("Unknown option: --bogus")
    expect(() => validateRawOptions(["list", "-z"], specs)).toThrowError("Unknown option: -z")
  })

  it("rejects value options without a value", () => {
    expect(() => validateRawOptions(["exp", "a", "--repo"], specs)).toThrowError("Missing value for option: --repo")
    expect(() => validateRawOptions(["exp", "a", "-r", "-f"], specs)).toThrowError("Missing value for option: -r")
    expect(() => validateRawOptions(["exp", "a", "--repo="], specs)).toThrowError("Missing value for option: --repo")
  })

  it("collects every value of a repeatable option in order", () => {
    expect(
      collectOptionValues({
        args: ["project", "p", "-r", "api", "--repo=web", "-rdocs", "--repo", "infra"],
        longName: "repo",
        shortName: "r",
      }),
    ).toEqual(["api", "web", "docs", "infra"])
  })

  it("reads the last non-empty string value", () => {
    expect(readStringOption("main")).toBe("main")
    expect(readStringOption("")).toBeUndefined()
    expect(readStringOption(["a", "b"])).toBe("b")
    expect(readStringOption(true)).toBeUndefined()
  })

  it("enforces positional argument counts", () => {
    expect(() => ensureArgumentCount({ command: "open", args: ["a"], min: 0, max: 1 })).not.toThrow()
    expect(() => ensureArgumentCount({ command: "open", args: ["a", "b"], min: 0, max: 1 })).toThrowError(
      "open expects 0-1 positional argument(s), received 2",
    )
  })
})
