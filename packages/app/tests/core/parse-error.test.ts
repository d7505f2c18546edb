import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  describeParseError,
  invalidCharacter,
  invalidEscapeCharacter,
  invalidHex,
  invalidNumber,
  nestingTooDeep,
  unexpectedCharacter,
  unexpectedEnd
} from "../../src/core/parse-error.js"

describe("describeParseError", () => {
  it.effect("names characters by code point", () =>
    Effect.sync(() => {
      expect(describeParseError(unexpectedEnd)).toBe("Unexpected end of input")
      expect(describeParseError(unexpectedCharacter("]", 3))).toBe("Unexpected character U+005D at position 3")
      expect(describeParseError(unexpectedCharacter("😀", 0))).toBe("Unexpected character U+1F600 at position 0")
    }))

  it.effect("quotes the context of string failures", () =>
    Effect.sync(() => {
      expect(describeParseError(invalidCharacter("\u0005", "\u0005\"", 1))).toBe(
        `Invalid character U+0005 in string at position 1: "\\u0005\\""`
      )
      expect(describeParseError(invalidEscapeCharacter("x", "x\"", 2))).toBe(
        `Invalid escape character "x" at position 2: "x\\""`
      )
      expect(describeParseError(invalidHex("d800", "d800\"", 3))).toBe(
        `Invalid unicode escape "d800" at position 3`
      )
    }))

  it.effect("truncates long snippets", () =>
    Effect.sync(() => {
      const literal = "1".repeat(30)
      expect(describeParseError(invalidNumber(literal, literal, 0))).toBe(
        `Invalid number "${"1".repeat(24)}…" at position 0`
      )
      expect(describeParseError(invalidNumber("-", "-", 5))).toBe(`Invalid number "-" at position 5`)
    }))

  it.effect("reports the nesting limit", () =>
    Effect.sync(() => {
      expect(describeParseError(nestingTooDeep(2, 2))).toBe("Nesting deeper than 2 levels at position 2")
    }))
})
