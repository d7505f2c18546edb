import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import type { OutcomeTable, ProfileOutcomes } from "../core/fixture.js"
import { emptyOutcomeTable } from "../core/fixture.js"
import { loadJsonFile } from "./json-file.js"

// CHANGE: load the per-profile outcome table of implementation-defined fixtures
// WHY: the table is the oracle for i_ fixtures and must be validated before a run
// FORMAT THEOREM: ∀t: decode(t) = Right(m) → ∀k ∈ m: m[k].scalar, m[k].utf16 ∈ {accept, reject, ⊥}
// PURITY: SHELL
// EFFECT: Effect<OutcomeTable, AppError, FileSystem>
// INVARIANT: a missing implicit table yields the empty table
// COMPLEXITY: O(n)

const OutcomeSchema = S.Literal("accept", "reject")

export const OutcomeTableSchema = S.Record({
  key: S.String,
  value: S.partial(S.Struct({ scalar: OutcomeSchema, utf16: OutcomeSchema }))
})

type RawOutcomeTable = S.Schema.Type<typeof OutcomeTableSchema>

const toOutcomeTable = (raw: RawOutcomeTable): OutcomeTable => {
  const table = new Map<string, ProfileOutcomes>()
  for (const [file, outcomes] of Object.entries(raw)) {
    table.set(file, {
      ...(outcomes.scalar === undefined ? {} : { scalar: outcomes.scalar }),
      ...(outcomes.utf16 === undefined ? {} : { utf16: outcomes.utf16 })
    })
  }
  return table
}

export const loadOutcomeTable = (
  path: string,
  explicit: boolean
): Effect.Effect<OutcomeTable, AppError, FileSystemService> =>
  loadJsonFile(OutcomeTableSchema, path, explicit).pipe(
    Effect.map((raw) => raw === undefined ? emptyOutcomeTable : toOutcomeTable(raw))
  )
