import { Match } from "effect"

import type { CharsetError } from "./charset.js"
import type { CliError } from "./cli.js"
import type { ParseError } from "./parse-error.js"
import { describeParseError } from "./parse-error.js"

// CHANGE: unify the error algebra of the CLI program
// WHY: decoder failures on project files and IO failures share one exit path (code 1)
// FORMAT THEOREM: ∀e ∈ AppError: describe(e) is a single line
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a ParseError reaches the user only wrapped with the file it came from
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly file: string; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type FixturesNotFound = { readonly _tag: "FixturesNotFound"; readonly path: string }
export type DecodeFileError = {
  readonly _tag: "DecodeFileError"
  readonly file: string
  readonly error: CharsetError
}
export type DocumentError = {
  readonly _tag: "DocumentError"
  readonly file: string
  readonly error: ParseError
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | FixturesNotFound
  | DecodeFileError
  | DocumentError

export const configError = (file: string, message: string): ConfigError => ({
  _tag: "ConfigError",
  file,
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const fixturesNotFound = (path: string): FixturesNotFound => ({
  _tag: "FixturesNotFound",
  path
})

export const decodeFileError = (file: string, error: CharsetError): DecodeFileError => ({
  _tag: "DecodeFileError",
  file,
  error
})

export const documentError = (file: string, error: ParseError): DocumentError => ({
  _tag: "DocumentError",
  file,
  error
})

/**
 * Render an AppError as a single diagnostic line.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `${value.file}: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("FixturesNotFound", (value) => `Fixture directory not found: ${value.path}`),
    Match.tag(
      "DecodeFileError",
      (value) => `${value.file}: cannot decode as ${value.error.encoding}: ${value.error.message}`
    ),
    Match.tag("DocumentError", (value) => `${value.file}: ${describeParseError(value.error)}`),
    Match.exhaustive
  )
