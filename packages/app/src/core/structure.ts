import * as Either from "effect/Either"

import type { Cursor, Step } from "./cursor.js"
import { advance, peek, skipWhitespace, step } from "./cursor.js"
import type { UnicodeProfile } from "./options.js"
import type { ParseError } from "./parse-error.js"
import { unexpectedCharacter, unexpectedEnd } from "./parse-error.js"
import { decodeString } from "./string.js"
import type { ArrayValue, ObjectValue, Value } from "./value.js"
import { arrayValue, objectValue } from "./value.js"

// CHANGE: implement the array and object state machines over the token stream
// WHY: each structural token is valid only in specific states; wrong tokens fail at their position
// FORMAT THEOREM: ∀o: parseObject(o) = Right(m) → keys(m) are unique and hold the last written value
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: nested values are parsed by the injected ValueParser at depth + 1
// COMPLEXITY: O(n) over the structure, excluding nested values

/**
 * Parses one value starting at the cursor (leading whitespace allowed).
 * `depth` is the number of arrays/objects enclosing the value.
 */
export type ValueParser = (cursor: Cursor, depth: number) => Either.Either<Step<Value>, ParseError>

type ArrayState = "start" | "after-comma" | "after-value"

/**
 * Parse array elements after the opening `[`.
 *
 * @param cursor - Cursor just after `[`.
 * @param depth - Depth of the elements.
 * @param parseValue - Dispatcher for elements.
 * @returns Either with the array and the cursor after `]`.
 *
 * @pure true
 * @invariant `]` closes only in start or after-value; `,` is valid only after a value
 * @complexity O(n)
 */
export const parseArray = (
  cursor: Cursor,
  depth: number,
  parseValue: ValueParser
): Either.Either<Step<ArrayValue>, ParseError> => {
  const items: Array<Value> = []
  let state: ArrayState = "start"
  let current = cursor
  while (true) {
    current = skipWhitespace(current)
    const char = peek(current)
    if (char === undefined) {
      return Either.left(unexpectedEnd)
    }
    if (char === "]") {
      if (state === "after-comma") {
        return Either.left(unexpectedCharacter(char, current.offset))
      }
      return Either.right(step(arrayValue(items), advance(current)))
    }
    if (char === ",") {
      if (state !== "after-value") {
        return Either.left(unexpectedCharacter(char, current.offset))
      }
      state = "after-comma"
      current = advance(current)
      continue
    }
    if (state === "after-value") {
      return Either.left(unexpectedCharacter(char, current.offset))
    }
    const element = parseValue(current, depth)
    if (Either.isLeft(element)) {
      return Either.left(element.left)
    }
    items.push(element.right.value)
    current = element.right.cursor
    state = "after-value"
  }
}

type ObjectState =
  | { readonly _tag: "Start" }
  | { readonly _tag: "AfterComma" }
  | { readonly _tag: "HaveKey"; readonly key: string }
  | { readonly _tag: "AfterValue" }

/**
 * Parse object members after the opening `{`.
 *
 * Duplicate keys overwrite the stored value; the key keeps the slot of its first occurrence.
 *
 * @param cursor - Cursor just after `{`.
 * @param depth - Depth of the member values.
 * @param parseValue - Dispatcher for member values.
 * @param profile - Unicode profile used to decode keys.
 * @returns Either with the object and the cursor after `}`.
 *
 * @pure true
 * @invariant `}` closes only in Start or AfterValue; keys start only in Start or AfterComma
 * @complexity O(n)
 */
export const parseObject = (
  cursor: Cursor,
  depth: number,
  parseValue: ValueParser,
  profile: UnicodeProfile
): Either.Either<Step<ObjectValue>, ParseError> => {
  const entries = new Map<string, Value>()
  let state: ObjectState = { _tag: "Start" }
  let current = cursor
  while (true) {
    current = skipWhitespace(current)
    const char = peek(current)
    if (char === undefined) {
      return Either.left(unexpectedEnd)
    }
    if (char === "}" && (state._tag === "Start" || state._tag === "AfterValue")) {
      return Either.right(step(objectValue(entries), advance(current)))
    }
    if (char === "\"" && (state._tag === "Start" || state._tag === "AfterComma")) {
      const key = decodeString(current, profile)
      if (Either.isLeft(key)) {
        return Either.left(key.left)
      }
      state = { _tag: "HaveKey", key: key.right.value }
      current = key.right.cursor
      continue
    }
    if (char === ":" && state._tag === "HaveKey") {
      const member = parseValue(advance(current), depth)
      if (Either.isLeft(member)) {
        return Either.left(member.left)
      }
      entries.set(state.key, member.right.value)
      state = { _tag: "AfterValue" }
      current = member.right.cursor
      continue
    }
    if (char === "," && state._tag === "AfterValue") {
      state = { _tag: "AfterComma" }
      current = advance(current)
      continue
    }
    return Either.left(unexpectedCharacter(char, current.offset))
  }
}
