import { Match } from "effect"

import type { DecodedText } from "./charset.js"
import { observedOutcome } from "./conformance.js"
import { describeParseError } from "./parse-error.js"
import type { ConformanceReport, FixtureResult, Observed } from "./types.js"
import type { Value } from "./value.js"

// CHANGE: render conformance reports and value summaries
// WHY: keep reporting pure and deterministic across CLI output formats
// FORMAT THEOREM: ∀r: lines(render(r)) list every failed and unpinned fixture
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result order follows the report (sorted by file name)
// COMPLEXITY: O(n)

const describeObserved = (observed: Observed): string =>
  Match.value(observed).pipe(
    Match.tag("Accepted", () => "accept"),
    Match.tag("Rejected", (value) => `reject (${describeParseError(value.error)})`),
    Match.tag(
      "Undecodable",
      (value) => `reject (cannot decode as ${value.error.encoding}: ${value.error.message})`
    ),
    Match.exhaustive
  )

const observedError = (observed: Observed): string | null =>
  Match.value(observed).pipe(
    Match.tag("Accepted", () => null),
    Match.tag("Rejected", (value) => describeParseError(value.error)),
    Match.tag("Undecodable", (value) => value.error.message),
    Match.exhaustive
  )

const formatList = (title: string, values: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${value}`)]
}

const formatFailure = (result: FixtureResult): string =>
  `${result.file}: expected ${result.expected ?? "either"}, observed ${describeObserved(result.observed)}`

const formatUnpinned = (result: FixtureResult): string =>
  `${result.file}: observed ${describeObserved(result.observed)}`

/**
 * Render a human-readable conformance report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant output lists all required sections
 * @complexity O(n)
 */
export const renderHumanReport = (report: ConformanceReport): string => {
  const { summary } = report
  return [
    `Profile: ${report.profile}`,
    ...formatList("Failures", report.results.filter((result) => result.verdict === "fail").map(formatFailure)),
    ...formatList("Unpinned", report.results.filter((result) => result.verdict === "unpinned").map(formatUnpinned)),
    ...formatList("Skipped", report.skipped),
    `Stats: total=${summary.total}, passed=${summary.passed}, failed=${summary.failed}, ` +
    `unpinned=${summary.unpinned}, skipped=${summary.skipped}`
  ].join("\n")
}

/**
 * Render a conformance report as JSON text.
 *
 * @pure true
 * @invariant every result carries file, kind, expected, observed and verdict
 * @complexity O(n)
 */
export const renderJsonReport = (report: ConformanceReport): string =>
  JSON.stringify(
    {
      profile: report.profile,
      summary: report.summary,
      results: report.results.map((result) => ({
        file: result.file,
        kind: result.kind,
        expected: result.expected ?? null,
        observed: observedOutcome(result.observed),
        verdict: result.verdict,
        error: observedError(result.observed)
      })),
      skipped: report.skipped
    },
    null,
    2
  )

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? "" : "s"}`

/**
 * One-line description of a value without its children.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeValue = (value: Value): string =>
  Match.value(value).pipe(
    Match.tag("String", (node) => `string (${plural(Array.from(node.value).length, "char")})`),
    Match.tag("Number", (node) =>
      node.exact === undefined
        ? `number ${node.literal} (approximate ${String(node.approximate)})`
        : `number ${node.literal} (exact ${node.exact.toString()})`),
    Match.tag("Bool", (node) => `boolean ${String(node.value)}`),
    Match.tag("Null", () => "null"),
    Match.tag("Array", (node) => `array (${plural(node.items.length, "item")})`),
    Match.tag("Object", (node) => `object (${plural(node.entries.size, "key")})`),
    Match.exhaustive
  )

const describeChildren = (value: Value): ReadonlyArray<string> => {
  if (value._tag === "Array") {
    return value.items.map((item, index) => `  [${index}]: ${describeValue(item)}`)
  }
  if (value._tag === "Object") {
    return [...value.entries].map(([key, item]) => `  ${JSON.stringify(key)}: ${describeValue(item)}`)
  }
  return []
}

/**
 * Render a parsed document: encoding line, the root value and its direct children.
 *
 * @pure true
 * @complexity O(k) where k = direct children
 */
export const renderValue = (file: string, decoded: DecodedText, value: Value): string =>
  [
    `${file} (${decoded.encoding}${decoded.bom ? ", BOM" : ""})`,
    describeValue(value),
    ...describeChildren(value)
  ].join("\n")

export const renderValueJson = (file: string, decoded: DecodedText, value: Value): string =>
  JSON.stringify(
    {
      file,
      encoding: decoded.encoding,
      bom: decoded.bom,
      type: value._tag,
      summary: describeValue(value)
    },
    null,
    2
  )
