import { Match } from "effect"

// CHANGE: define the closed parse failure algebra of the decoder
// WHY: every failure carries the offending lexeme and position so two profiles can be compared exactly
// FORMAT THEOREM: ∀e ∈ ParseError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: position counts code points consumed before the offending lexeme
// COMPLEXITY: O(1)/O(1)

export type UnexpectedEnd = { readonly _tag: "UnexpectedEnd" }

export type UnexpectedCharacter = {
  readonly _tag: "UnexpectedCharacter"
  readonly character: string
  readonly position: number
}

export type InvalidCharacter = {
  readonly _tag: "InvalidCharacter"
  readonly character: string
  readonly context: string
  readonly position: number
}

export type InvalidEscapeCharacter = {
  readonly _tag: "InvalidEscapeCharacter"
  readonly character: string
  readonly context: string
  readonly position: number
}

export type InvalidHex = {
  readonly _tag: "InvalidHex"
  readonly hex: string
  readonly context: string
  readonly position: number
}

export type InvalidNumber = {
  readonly _tag: "InvalidNumber"
  readonly literal: string
  readonly context: string
  readonly position: number
}

export type NestingTooDeep = {
  readonly _tag: "NestingTooDeep"
  readonly depth: number
  readonly position: number
}

export type ParseError =
  | UnexpectedEnd
  | UnexpectedCharacter
  | InvalidCharacter
  | InvalidEscapeCharacter
  | InvalidHex
  | InvalidNumber
  | NestingTooDeep

export const unexpectedEnd: UnexpectedEnd = { _tag: "UnexpectedEnd" }

export const unexpectedCharacter = (character: string, position: number): UnexpectedCharacter => ({
  _tag: "UnexpectedCharacter",
  character,
  position
})

export const invalidCharacter = (
  character: string,
  context: string,
  position: number
): InvalidCharacter => ({
  _tag: "InvalidCharacter",
  character,
  context,
  position
})

export const invalidEscapeCharacter = (
  character: string,
  context: string,
  position: number
): InvalidEscapeCharacter => ({
  _tag: "InvalidEscapeCharacter",
  character,
  context,
  position
})

export const invalidHex = (hex: string, context: string, position: number): InvalidHex => ({
  _tag: "InvalidHex",
  hex,
  context,
  position
})

export const invalidNumber = (literal: string, context: string, position: number): InvalidNumber => ({
  _tag: "InvalidNumber",
  literal,
  context,
  position
})

export const nestingTooDeep = (depth: number, position: number): NestingTooDeep => ({
  _tag: "NestingTooDeep",
  depth,
  position
})

const SNIPPET_LIMIT = 24

const codePointLabel = (character: string): string => {
  const code = character.codePointAt(0) ?? 0
  return `U+${code.toString(16).toUpperCase().padStart(4, "0")}`
}

const snippet = (context: string): string => {
  const chars = Array.from(context)
  const head = chars.slice(0, SNIPPET_LIMIT).join("")
  return JSON.stringify(chars.length > SNIPPET_LIMIT ? `${head}…` : head)
}

/**
 * Render a one-line message for a parse failure.
 *
 * @param error - Parse failure.
 * @returns Message suitable for logs and reports.
 *
 * @pure true
 * @invariant every variant has a message naming its position when it carries one
 * @complexity O(1)
 */
export const describeParseError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.tag("UnexpectedEnd", () => "Unexpected end of input"),
    Match.tag(
      "UnexpectedCharacter",
      (value) => `Unexpected character ${codePointLabel(value.character)} at position ${value.position}`
    ),
    Match.tag(
      "InvalidCharacter",
      (value) =>
        `Invalid character ${codePointLabel(value.character)} in string at position ${value.position}: ${
          snippet(value.context)
        }`
    ),
    Match.tag(
      "InvalidEscapeCharacter",
      (value) =>
        `Invalid escape character ${JSON.stringify(value.character)} at position ${value.position}: ${
          snippet(value.context)
        }`
    ),
    Match.tag(
      "InvalidHex",
      (value) => `Invalid unicode escape ${JSON.stringify(value.hex)} at position ${value.position}`
    ),
    Match.tag(
      "InvalidNumber",
      (value) => `Invalid number ${snippet(value.literal)} at position ${value.position}`
    ),
    Match.tag(
      "NestingTooDeep",
      (value) => `Nesting deeper than ${value.depth} levels at position ${value.position}`
    ),
    Match.exhaustive
  )
