import * as Either from "effect/Either"

import type { Cursor, Step } from "./cursor.js"
import { advance, makeCursor, peek, skipWhitespace, step, take } from "./cursor.js"
import { decodeNumber } from "./number.js"
import type { ParseOptions } from "./options.js"
import { resolveParseOptions } from "./options.js"
import type { ParseError } from "./parse-error.js"
import { nestingTooDeep, unexpectedCharacter, unexpectedEnd } from "./parse-error.js"
import { decodeString } from "./string.js"
import type { ValueParser } from "./structure.js"
import { parseArray, parseObject } from "./structure.js"
import type { Value } from "./value.js"
import { boolValue, nullValue, stringValue } from "./value.js"

// CHANGE: dispatch on the first significant code point and enforce a single top-level document
// WHY: the first character always selects the production; anything after the document is an error
// FORMAT THEOREM: ∀t: parse(t) = Right(v) → t = ws · json(v) · ws
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failure aborts the whole parse; no partial tree escapes
// COMPLEXITY: O(n)

const BYTE_ORDER_MARK = "\uFEFF"

const KEYWORDS: ReadonlyArray<readonly [string, Value]> = [
  ["true", boolValue(true)],
  ["false", boolValue(false)],
  ["null", nullValue]
]

const parseKeyword = (cursor: Cursor, char: string): Either.Either<Step<Value>, ParseError> => {
  const keyword = KEYWORDS.find(([text]) => text.startsWith(char))
  if (keyword === undefined) {
    return Either.left(unexpectedCharacter(char, cursor.offset))
  }
  const [text, value] = keyword
  const found = take(cursor, text.length)
  if (found === text) {
    return Either.right(step(value, advance(cursor, text.length)))
  }
  if (cursor.offset + Array.from(found).length === cursor.chars.length && text.startsWith(found)) {
    return Either.left(unexpectedEnd)
  }
  return Either.left(unexpectedCharacter(char, cursor.offset))
}

const isNumberStart = (char: string): boolean => char === "-" || (char >= "0" && char <= "9")

const makeValueParser = (options: ParseOptions): ValueParser => {
  const parseValue: ValueParser = (cursor, depth) => {
    const current = skipWhitespace(cursor)
    const char = peek(current)
    if (char === undefined) {
      return Either.left(unexpectedEnd)
    }
    switch (char) {
      case "[":
      case "{": {
        if (depth >= options.maxDepth) {
          return Either.left(nestingTooDeep(options.maxDepth, current.offset))
        }
        return char === "["
          ? parseArray(advance(current), depth + 1, parseValue)
          : parseObject(advance(current), depth + 1, parseValue, options.profile)
      }
      case "\"":
        return Either.map(
          decodeString(current, options.profile),
          (decoded) => step(stringValue(decoded.value), decoded.cursor)
        )
      case "t":
      case "f":
      case "n":
        return parseKeyword(current, char)
      default:
        return isNumberStart(char)
          ? decodeNumber(current, options)
          : Either.left(unexpectedCharacter(char, current.offset))
    }
  }
  return parseValue
}

// a leading BOM is ignorable only under the utf16 profile and only in front of an object
const skipByteOrderMark = (cursor: Cursor, options: ParseOptions): Cursor => {
  if (options.profile !== "utf16" || peek(cursor) !== BYTE_ORDER_MARK) {
    return cursor
  }
  const next = advance(cursor)
  return peek(skipWhitespace(next)) === "{" ? next : cursor
}

/**
 * Parse one JSON document.
 *
 * @param text - Complete document text.
 * @param options - Unicode profile and limits; defaults apply for omitted fields.
 * @returns Either with the decoded Value or the first ParseError.
 *
 * @pure true
 * @invariant trailing non-whitespace fails with UnexpectedCharacter at its position
 * @complexity O(n)
 */
export const parse = (
  text: string,
  options?: Partial<ParseOptions>
): Either.Either<Value, ParseError> => {
  const resolved = resolveParseOptions(options)
  const start = skipByteOrderMark(makeCursor(text), resolved)
  const parsed = makeValueParser(resolved)(start, 0)
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const rest = skipWhitespace(parsed.right.cursor)
  const leftover = peek(rest)
  if (leftover !== undefined) {
    return Either.left(unexpectedCharacter(leftover, rest.offset))
  }
  return Either.right(parsed.right.value)
}
