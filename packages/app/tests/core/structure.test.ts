import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { advance, makeCursor, step } from "../../src/core/cursor.js"
import { unexpectedCharacter, unexpectedEnd } from "../../src/core/parse-error.js"
import type { ValueParser } from "../../src/core/structure.js"
import { parseArray, parseObject } from "../../src/core/structure.js"
import { arrayValue, exactNumber, nullValue, objectValue, stringValue } from "../../src/core/value.js"
import { parsedValue, parseFailure } from "./test-helpers.js"

// consumes one "x" and records the depth it was called with
const recordingParser = (depths: Array<number>): ValueParser => (cursor, depth) => {
  depths.push(depth)
  const start = cursor.chars[cursor.offset] === " " ? advance(cursor) : cursor
  return Either.right(step(nullValue, advance(start)))
}

describe("parseArray", () => {
  it.effect("passes its depth to the element parser", () =>
    Effect.sync(() => {
      const depths: Array<number> = []
      const parsed = parseArray(advance(makeCursor("[x,x]")), 3, recordingParser(depths))
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.value).toEqual(arrayValue([nullValue, nullValue]))
        expect(parsed.right.cursor.offset).toBe(5)
      }
      expect(depths).toEqual([3, 3])
    }))

  it.effect("rejects misplaced commas and brackets", () =>
    Effect.sync(() => {
      expect(parseFailure("[1,]")).toEqual(unexpectedCharacter("]", 3))
      expect(parseFailure("[,1]")).toEqual(unexpectedCharacter(",", 1))
      expect(parseFailure("[1 2]")).toEqual(unexpectedCharacter("2", 3))
      expect(parseFailure("[1,,2]")).toEqual(unexpectedCharacter(",", 3))
      expect(parseFailure("[1}")).toEqual(unexpectedCharacter("}", 2))
    }))

  it.effect("parses nested structures", () =>
    Effect.sync(() => {
      expect(parsedValue("[{\"a\":[1,{\"b\":null}]}]")).toEqual(
        arrayValue([
          objectValue(
            new Map([["a", arrayValue([exactNumber(1n, "1"), objectValue(new Map([["b", nullValue]]))])]])
          )
        ])
      )
    }))
})

describe("parseObject", () => {
  it.effect("passes its depth to the member parser", () =>
    Effect.sync(() => {
      const depths: Array<number> = []
      const parsed = parseObject(advance(makeCursor("{\"a\": x}")), 2, recordingParser(depths), "scalar")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.value).toEqual(objectValue(new Map([["a", nullValue]])))
      }
      expect(depths).toEqual([2])
    }))

  it.effect("accepts empty and spaced objects", () =>
    Effect.sync(() => {
      expect(parsedValue("{}")).toEqual(objectValue(new Map()))
      expect(parsedValue("{ \"k\" : \"v\" }")).toEqual(objectValue(new Map([["k", stringValue("v")]])))
    }))

  it.effect("reports every wrong token at its position", () =>
    Effect.sync(() => {
      expect(parseFailure("{\"a\" 1}")).toEqual(unexpectedCharacter("1", 5))
      expect(parseFailure("{\"a\":1,}")).toEqual(unexpectedCharacter("}", 7))
      expect(parseFailure("{\"a\":1 \"b\":2}")).toEqual(unexpectedCharacter("\"", 7))
      expect(parseFailure("{\"a\"::1}")).toEqual(unexpectedCharacter(":", 5))
      expect(parseFailure("{1:2}")).toEqual(unexpectedCharacter("1", 1))
      expect(parseFailure("{,}")).toEqual(unexpectedCharacter(",", 1))
      expect(parseFailure("{\"a\"}")).toEqual(unexpectedCharacter("}", 4))
      expect(parseFailure("{\"a\":1]")).toEqual(unexpectedCharacter("]", 6))
    }))

  it.effect("fails with UnexpectedEnd when the input stops inside an object", () =>
    Effect.sync(() => {
      expect(parseFailure("{")).toEqual(unexpectedEnd)
      expect(parseFailure("{\"a\"")).toEqual(unexpectedEnd)
      expect(parseFailure("{\"a\":")).toEqual(unexpectedEnd)
      expect(parseFailure("{\"a\":1")).toEqual(unexpectedEnd)
      expect(parseFailure("{\"a\":1,")).toEqual(unexpectedEnd)
    }))
})
