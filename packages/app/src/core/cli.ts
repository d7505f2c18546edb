import { Match } from "effect"
import * as Either from "effect/Either"

import type { UnicodeProfile } from "./options.js"
import { isUnicodeProfile, MAX_DEPTH_CEILING, parseLimit } from "./options.js"

// CHANGE: implement deterministic CLI parsing for json-strict
// WHY: flags select the fixture set, the Unicode profile and decoder limits before any IO happens
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → (args.command = parse ↔ args.file ≠ undefined)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; only `parse` takes a positional argument
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "parse"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string | undefined
  readonly fixtures: string | undefined
  readonly profile: UnicodeProfile | undefined
  readonly expectations: string | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly maxExponent: number | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.json-strict.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
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

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs): Either.Either<ParsedFlag, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseLimitFlag = (
  flagName: string,
  raw: string,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER
): Either.Either<number, CliError> => Either.mapLeft(parseLimit(`--${flagName}`, raw, minimum, maximum), cliError)

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }),
  silent: (current) => setParsedFlag({ ...current, silent: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  fixtures: (current, inlineValue, nextValue) =>
    parseValueFlag("fixtures", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, fixtures: value })),
  expectations: (current, inlineValue, nextValue) =>
    parseValueFlag("expectations", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, expectations: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configPathExplicit: true })),
  profile: (current, inlineValue, nextValue) =>
    parseValueFlag("profile", current, inlineValue, nextValue, (args, value) =>
      isUnicodeProfile(value)
        ? Either.right({ ...args, profile: value })
        : Either.left(cliError(`Unknown profile: ${value} (expected scalar or utf16)`))),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseLimitFlag("max-depth", value, 1, MAX_DEPTH_CEILING), (maxDepth) => ({ ...args, maxDepth }))),
  "max-exponent": (current, inlineValue, nextValue) =>
    parseValueFlag("max-exponent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseLimitFlag("max-exponent", value, 0), (maxExponent) => ({ ...args, maxExponent })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (value: string, current: CliArgs): Either.Either<CliArgs, CliError> => {
  if (current.command !== "parse" || current.file !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${value}`))
  }
  return Either.right({ ...current, file: value })
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "check", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      const positional = parsePositional(current, args)
      if (Either.isLeft(positional)) {
        return positional
      }
      args = positional.right
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (args.command === "parse" && args.file === undefined) {
    return Either.left(cliError("Missing file argument for parse"))
  }
  return Either.right(args)
}

/**
 * Read `json-strict [check|parse <file>] [flags]` from process.argv.
 *
 * @param argv - Raw process.argv array; the first two entries are skipped.
 * @returns Either with CliArgs or the first CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => parseArguments(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
  )
}
