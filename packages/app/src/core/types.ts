import type { CharsetError, Encoding } from "./charset.js"
import type { ExpectedOutcome, FixtureKind } from "./fixture.js"
import type { UnicodeProfile } from "./options.js"
import type { ParseError } from "./parse-error.js"

// CHANGE: define conformance run results, verdicts and summaries
// WHY: keep IO-free data structures reusable across CLI output formats and tests
// FORMAT THEOREM: ∀r ∈ ConformanceReport: r.summary.total = |r.results|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: verdict = "unpinned" ↔ expected = undefined
// COMPLEXITY: O(1)/O(1)

export type Observed =
  | { readonly _tag: "Accepted"; readonly encoding: Encoding }
  | { readonly _tag: "Rejected"; readonly encoding: Encoding; readonly error: ParseError }
  | { readonly _tag: "Undecodable"; readonly error: CharsetError }

export type Verdict = "pass" | "fail" | "unpinned"

export interface FixtureResult {
  readonly file: string
  readonly kind: FixtureKind
  readonly expected: ExpectedOutcome | undefined
  readonly observed: Observed
  readonly verdict: Verdict
}

export interface ConformanceSummary {
  readonly total: number
  readonly passed: number
  readonly failed: number
  readonly unpinned: number
  readonly skipped: number
}

export interface ConformanceReport {
  readonly profile: UnicodeProfile
  readonly results: ReadonlyArray<FixtureResult>
  readonly skipped: ReadonlyArray<string>
  readonly summary: ConformanceSummary
}
