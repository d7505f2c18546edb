import * as Either from "effect/Either"

import { decodeDocument } from "./charset.js"
import type { ExpectedOutcome, FixtureKind, OutcomeTable } from "./fixture.js"
import { expectedOutcome } from "./fixture.js"
import type { ParseOptions, UnicodeProfile } from "./options.js"
import { parse } from "./parse.js"
import type { ConformanceReport, FixtureResult, Observed, Verdict } from "./types.js"

// CHANGE: evaluate fixtures against their expected outcome for one Unicode profile
// WHY: both profiles must be reproducible independently from the same fixture set
// FORMAT THEOREM: ∀f: verdict(f) = pass ↔ expected(f) = outcome(observe(f))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: undecodable bytes count as a rejection
// COMPLEXITY: O(n) per fixture

/**
 * Decode bytes and parse them, recording what happened.
 *
 * @pure true
 * @complexity O(n)
 */
export const observeDocument = (bytes: Uint8Array, options: ParseOptions): Observed => {
  const decoded = decodeDocument(bytes)
  if (Either.isLeft(decoded)) {
    return { _tag: "Undecodable", error: decoded.left }
  }
  const { encoding, text } = decoded.right
  const parsed = parse(text, options)
  return Either.isLeft(parsed)
    ? { _tag: "Rejected", encoding, error: parsed.left }
    : { _tag: "Accepted", encoding }
}

export const observedOutcome = (observed: Observed): ExpectedOutcome =>
  observed._tag === "Accepted" ? "accept" : "reject"

const judge = (expected: ExpectedOutcome | undefined, observed: Observed): Verdict => {
  if (expected === undefined) {
    return "unpinned"
  }
  return expected === observedOutcome(observed) ? "pass" : "fail"
}

export interface FixtureInput {
  readonly file: string
  readonly kind: FixtureKind
  readonly bytes: Uint8Array
}

/**
 * Run one fixture and compare the outcome with the table.
 *
 * @param input - File name, classification and contents.
 * @param options - Parse options; the profile selects the table column.
 * @param table - Outcomes of implementation-defined fixtures.
 * @returns Fixture result with verdict.
 *
 * @pure true
 * @complexity O(n)
 */
export const evaluateFixture = (
  input: FixtureInput,
  options: ParseOptions,
  table: OutcomeTable
): FixtureResult => {
  const expected = expectedOutcome(input.file, input.kind, options.profile, table)
  const observed = observeDocument(input.bytes, options)
  return {
    file: input.file,
    kind: input.kind,
    expected,
    observed,
    verdict: judge(expected, observed)
  }
}

const countVerdict = (results: ReadonlyArray<FixtureResult>, verdict: Verdict): number =>
  results.filter((result) => result.verdict === verdict).length

/**
 * Assemble the report of a conformance run.
 *
 * @pure true
 * @invariant summary counts add up to total
 * @complexity O(n)
 */
export const buildConformanceReport = (
  profile: UnicodeProfile,
  results: ReadonlyArray<FixtureResult>,
  skipped: ReadonlyArray<string>
): ConformanceReport => ({
  profile,
  results,
  skipped,
  summary: {
    total: results.length,
    passed: countVerdict(results, "pass"),
    failed: countVerdict(results, "fail"),
    unpinned: countVerdict(results, "unpinned"),
    skipped: skipped.length
  }
})

export const hasFailures = (report: ConformanceReport): boolean => report.summary.failed > 0
