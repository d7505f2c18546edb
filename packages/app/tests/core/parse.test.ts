import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  invalidCharacter,
  invalidHex,
  invalidNumber,
  nestingTooDeep,
  unexpectedCharacter,
  unexpectedEnd
} from "../../src/core/parse-error.js"
import {
  arrayValue,
  boolValue,
  exactNumber,
  nullValue,
  objectValue,
  stringValue,
  valueEquals
} from "../../src/core/value.js"
import { parsedValue, parseFailure } from "./test-helpers.js"

describe("parse", () => {
  it.effect("parses an empty array", () =>
    Effect.sync(() => {
      expect(parsedValue("[]")).toEqual(arrayValue([]))
    }))

  it.effect("parses an object with a null member", () =>
    Effect.sync(() => {
      expect(parsedValue("{\"test\": null}")).toEqual(objectValue(new Map([["test", nullValue]])))
    }))

  it.effect("decodes \\u escapes in the basic plane", () =>
    Effect.sync(() => {
      expect(parsedValue("\"\\u1000\\u2000\"")).toEqual(stringValue("\u1000\u2000"))
    }))

  it.effect("keeps integers exact inside arrays", () =>
    Effect.sync(() => {
      expect(parsedValue("[999, 111]")).toEqual(
        arrayValue([exactNumber(999n, "999"), exactNumber(111n, "111")])
      )
    }))

  it.effect("parses keywords", () =>
    Effect.sync(() => {
      expect(parsedValue("[true,false,null]")).toEqual(
        arrayValue([boolValue(true), boolValue(false), nullValue])
      )
    }))

  it.effect("ignores insignificant whitespace", () =>
    Effect.sync(() => {
      const spaced = parsedValue("  [ 1 , 2 ]  ")
      const compact = parsedValue("[1,2]")
      expect(valueEquals(spaced, compact)).toBe(true)
      expect(spaced).toEqual(compact)
    }))

  it.effect("lets the last duplicate key win and keeps its first slot", () =>
    Effect.sync(() => {
      const value = parsedValue("{\"1\":true, \"2\":false, \"1\":123}")
      expect(value._tag).toBe("Object")
      if (value._tag === "Object") {
        expect(value.entries.size).toBe(2)
        expect(value.entries.get("1")).toEqual(exactNumber(123n, "123"))
        expect(value.entries.get("2")).toEqual(boolValue(false))
        expect([...value.entries.keys()]).toEqual(["1", "2"])
      }
    }))

  it.effect("fails with UnexpectedEnd on unterminated arrays", () =>
    Effect.sync(() => {
      expect(parseFailure("[")).toEqual(unexpectedEnd)
      expect(parseFailure("[\n\n\r\t ")).toEqual(unexpectedEnd)
      expect(parseFailure("[1,")).toEqual(unexpectedEnd)
    }))

  it.effect("fails with UnexpectedEnd on empty input", () =>
    Effect.sync(() => {
      expect(parseFailure("")).toEqual(unexpectedEnd)
      expect(parseFailure(" \n\t")).toEqual(unexpectedEnd)
    }))

  it.effect("reports a bare minus inside an array with its context", () =>
    Effect.sync(() => {
      expect(parseFailure("[-]")).toEqual(invalidNumber("-]", "-]", 1))
    }))

  it.effect("reports a missing object value at the closing brace", () =>
    Effect.sync(() => {
      expect(parseFailure("{\"key\": }")).toEqual(unexpectedCharacter("}", 8))
    }))

  it.effect("rejects raw control characters in strings", () =>
    Effect.sync(() => {
      expect(parseFailure("\"\u0005\"")).toEqual(invalidCharacter("\u0005", "\u0005\"", 1))
    }))

  it.effect("rejects a lone high surrogate escape", () =>
    Effect.sync(() => {
      expect(parseFailure("\"\\ud800\"")).toEqual(invalidHex("d800", "d800\"", 3))
    }))

  it.effect("rejects content after the document", () =>
    Effect.sync(() => {
      expect(parseFailure("[1] x")).toEqual(unexpectedCharacter("x", 4))
      expect(parseFailure("truex")).toEqual(unexpectedCharacter("x", 4))
      expect(parseFailure("123abc")).toEqual(unexpectedCharacter("a", 3))
      expect(parseFailure("1.5.3")).toEqual(unexpectedCharacter(".", 3))
    }))

  it.effect("rejects characters that start no value", () =>
    Effect.sync(() => {
      expect(parseFailure(".5")).toEqual(unexpectedCharacter(".", 0))
      expect(parseFailure("['a']")).toEqual(unexpectedCharacter("'", 1))
      expect(parseFailure("\u00a0[]")).toEqual(unexpectedCharacter("\u00a0", 0))
    }))

  it.effect("distinguishes truncated keywords from misspelled ones", () =>
    Effect.sync(() => {
      expect(parseFailure("tru")).toEqual(unexpectedEnd)
      expect(parseFailure("[fals")).toEqual(unexpectedEnd)
      expect(parseFailure("trux")).toEqual(unexpectedCharacter("t", 0))
      expect(parseFailure("nan")).toEqual(unexpectedCharacter("n", 0))
      expect(parseFailure("[nul]")).toEqual(unexpectedCharacter("n", 1))
    }))

  it.effect("counts positions in code points", () =>
    Effect.sync(() => {
      expect(parsedValue("\"😀\"")).toEqual(stringValue("😀"))
      expect(parseFailure("\"😀\u0001\"")).toEqual(invalidCharacter("\u0001", "\u0001\"", 2))
      expect(parseFailure("[\"😀\" 1]")).toEqual(unexpectedCharacter("1", 5))
    }))
})

describe("parse with Unicode profiles", () => {
  it.effect("rejects a leading BOM under the scalar profile", () =>
    Effect.sync(() => {
      expect(parseFailure("\uFEFF{}")).toEqual(unexpectedCharacter("\uFEFF", 0))
      expect(parseFailure("\uFEFF{}", { profile: "scalar" })).toEqual(unexpectedCharacter("\uFEFF", 0))
    }))

  it.effect("ignores a leading BOM before an object under the utf16 profile", () =>
    Effect.sync(() => {
      expect(parsedValue("\uFEFF{}", { profile: "utf16" })).toEqual(objectValue(new Map()))
      expect(parsedValue("\uFEFF {\"a\": 1}", { profile: "utf16" })).toEqual(
        objectValue(new Map([["a", exactNumber(1n, "1")]]))
      )
    }))

  it.effect("still rejects a leading BOM before an array under the utf16 profile", () =>
    Effect.sync(() => {
      expect(parseFailure("\uFEFF[]", { profile: "utf16" })).toEqual(unexpectedCharacter("\uFEFF", 0))
      expect(parseFailure("\uFEFF\"a\"", { profile: "utf16" })).toEqual(unexpectedCharacter("\uFEFF", 0))
    }))

  it.effect("rejects surrogate escapes under both profiles", () =>
    Effect.sync(() => {
      const pair = "\"\\ud83d\\ude00\""
      expect(parseFailure(pair, { profile: "scalar" })).toEqual(invalidHex("d83d", "d83d\\ude00\"", 3))
      expect(parseFailure(pair, { profile: "utf16" })).toEqual(invalidHex("d83d", "d83d\\ude00\"", 3))
    }))

  it.effect("treats raw lone surrogates by profile", () =>
    Effect.sync(() => {
      expect(parseFailure("\"\uD800\"", { profile: "scalar" })).toEqual(
        invalidCharacter("\uD800", "\uD800\"", 1)
      )
      expect(parsedValue("\"\uD800\"", { profile: "utf16" })).toEqual(stringValue("\uD800"))
    }))
})

describe("parse nesting limit", () => {
  it.effect("accepts nesting up to maxDepth", () =>
    Effect.sync(() => {
      expect(parsedValue("[[]]", { maxDepth: 2 })).toEqual(arrayValue([arrayValue([])]))
    }))

  it.effect("fails past maxDepth at the opening bracket", () =>
    Effect.sync(() => {
      expect(parseFailure("[[[]]]", { maxDepth: 2 })).toEqual(nestingTooDeep(2, 2))
      expect(parseFailure("{\"a\":{\"b\":{}}}", { maxDepth: 2 })).toEqual(nestingTooDeep(2, 10))
    }))

  it.effect("bounds deep input with the default limit", () =>
    Effect.sync(() => {
      const deep = "[".repeat(600) + "]".repeat(600)
      expect(parseFailure(deep)).toEqual(nestingTooDeep(512, 512))
    }))

  it.effect("caps a requested limit above the depth ceiling", () =>
    Effect.sync(() => {
      const deep = "[".repeat(3000) + "]".repeat(3000)
      expect(parseFailure(deep, { maxDepth: 100_000 })).toEqual(nestingTooDeep(2048, 2048))
    }))
})
