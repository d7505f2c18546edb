import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { DEFAULT_CONFIG_PATH, parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-strict", ...args]

const parsed = (...args: ReadonlyArray<string>): CliArgs => {
  const result = parseCliArgs(argv(...args))
  if (Either.isLeft(result)) {
    throw new Error(`expected arguments to parse, got: ${result.left.message}`)
  }
  return result.right
}

const failure = (...args: ReadonlyArray<string>): string => {
  const result = parseCliArgs(argv(...args))
  if (Either.isRight(result)) {
    throw new Error("expected arguments to be rejected")
  }
  return result.left.message
}

describe("parseCliArgs", () => {
  it.effect("defaults to check without a command", () =>
    Effect.sync(() => {
      expect(parsed()).toEqual({
        command: "check",
        file: undefined,
        fixtures: undefined,
        profile: undefined,
        expectations: undefined,
        configPath: DEFAULT_CONFIG_PATH,
        configPathExplicit: false,
        maxDepth: undefined,
        maxExponent: undefined,
        json: false,
        silent: false,
        verbose: false
      })
      expect(parsed("--json").command).toBe("check")
    }))

  it.effect("reads flags in both spellings", () =>
    Effect.sync(() => {
      const args = parsed("check", "--fixtures", "data", "--profile=utf16", "--max-depth", "4", "--max-exponent=0")
      expect(args.fixtures).toBe("data")
      expect(args.profile).toBe("utf16")
      expect(args.maxDepth).toBe(4)
      expect(args.maxExponent).toBe(0)
    }))

  it.effect("marks an explicit config path", () =>
    Effect.sync(() => {
      const args = parsed("--config", "ci.json", "--expectations", "table.json", "--verbose", "--silent")
      expect(args.configPath).toBe("ci.json")
      expect(args.configPathExplicit).toBe(true)
      expect(args.expectations).toBe("table.json")
      expect(args.verbose).toBe(true)
      expect(args.silent).toBe(true)
    }))

  it.effect("takes one file for parse", () =>
    Effect.sync(() => {
      const args = parsed("parse", "doc.json", "--json")
      expect(args.command).toBe("parse")
      expect(args.file).toBe("doc.json")
      expect(args.json).toBe(true)
    }))

  it.effect("rejects unknown commands and flags", () =>
    Effect.sync(() => {
      expect(failure("bogus")).toBe("Unknown command: bogus")
      expect(failure("--nope")).toBe("Unknown flag: --nope")
      expect(failure("-x")).toBe("Unknown flag: -x")
    }))

  it.effect("rejects missing or invalid flag values", () =>
    Effect.sync(() => {
      expect(failure("--fixtures")).toBe("Missing value for --fixtures")
      expect(failure("--fixtures", "--json")).toBe("Missing value for --fixtures")
      expect(failure("--profile", "utf8")).toBe("Unknown profile: utf8 (expected scalar or utf16)")
      expect(failure("--max-depth", "0")).toBe("--max-depth must be an integer ≥ 1, got: 0")
      expect(failure("--max-depth=100000")).toBe("--max-depth must be an integer ≤ 2048, got: 100000")
      expect(failure("--max-exponent=abc")).toBe("--max-exponent must be an integer, got: abc")
    }))

  it.effect("rejects misplaced positional arguments", () =>
    Effect.sync(() => {
      expect(failure("check", "extra")).toBe("Unexpected positional argument: extra")
      expect(failure("parse")).toBe("Missing file argument for parse")
      expect(failure("parse", "a.json", "b.json")).toBe("Unexpected positional argument: b.json")
    }))
})
