import * as Option from "effect/Option"

import type { UnicodeProfile } from "./options.js"

// CHANGE: classify conformance fixtures by file name prefix and resolve their expected outcome
// WHY: y_/n_ fixtures have a fixed outcome; i_ fixtures depend on the Unicode profile
// FORMAT THEOREM: ∀f: classify(f) = Some(k) → f ends with ".json" ∧ prefix(f) ∈ {y_, n_, i_}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: implementation-defined fixtures are only pinned by the outcome table
// COMPLEXITY: O(1)/O(1)

export type FixtureKind = "accept" | "reject" | "implementation-defined"

export type ExpectedOutcome = "accept" | "reject"

export interface ProfileOutcomes {
  readonly scalar?: ExpectedOutcome
  readonly utf16?: ExpectedOutcome
}

/**
 * Expected outcomes of implementation-defined fixtures, keyed by file name.
 */
export type OutcomeTable = ReadonlyMap<string, ProfileOutcomes>

export const emptyOutcomeTable: OutcomeTable = new Map()

const PREFIXES: ReadonlyArray<readonly [string, FixtureKind]> = [
  ["y_", "accept"],
  ["n_", "reject"],
  ["i_", "implementation-defined"]
]

export const classifyFixture = (fileName: string): Option.Option<FixtureKind> => {
  if (!fileName.endsWith(".json")) {
    return Option.none()
  }
  const match = PREFIXES.find(([prefix]) => fileName.startsWith(prefix))
  return match === undefined ? Option.none() : Option.some(match[1])
}

/**
 * Resolve the outcome a fixture must have under a profile.
 *
 * @param fileName - Fixture file name (no directory).
 * @param kind - Classification from the prefix.
 * @param profile - Active Unicode profile.
 * @param table - Outcomes of implementation-defined fixtures.
 * @returns The expected outcome, or undefined when either outcome is acceptable.
 *
 * @pure true
 * @complexity O(1)
 */
export const expectedOutcome = (
  fileName: string,
  kind: FixtureKind,
  profile: UnicodeProfile,
  table: OutcomeTable
): ExpectedOutcome | undefined => {
  if (kind === "accept") {
    return "accept"
  }
  if (kind === "reject") {
    return "reject"
  }
  return table.get(fileName)?.[profile]
}
