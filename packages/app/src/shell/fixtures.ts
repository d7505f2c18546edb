import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"

import { EXPECTATIONS_FILE_NAME } from "../core/config.js"
import { buildConformanceReport, evaluateFixture, observedOutcome } from "../core/conformance.js"
import type { AppError } from "../core/errors.js"
import { fileError, fixturesNotFound } from "../core/errors.js"
import type { FixtureKind, OutcomeTable } from "../core/fixture.js"
import { classifyFixture } from "../core/fixture.js"
import type { ParseOptions } from "../core/options.js"
import type { ConformanceReport, FixtureResult } from "../core/types.js"

// CHANGE: run the decoder over a fixture directory with Effect file system services
// WHY: isolate IO while producing a deterministic ConformanceReport
// FORMAT THEOREM: ∀f ∈ dir: classify(f) = Some(k) → f ∈ results, otherwise f ∈ skipped
// PURITY: SHELL
// EFFECT: Effect<ConformanceReport, AppError, FileSystem | Path>
// INVARIANT: fixtures are evaluated in sorted file name order
// COMPLEXITY: O(n) over total fixture bytes

export interface ConformanceSettings {
  readonly fixtures: string
  readonly options: ParseOptions
  readonly table: OutcomeTable
}

interface ClassifiedEntries {
  readonly fixtures: ReadonlyArray<{ readonly file: string; readonly kind: FixtureKind }>
  readonly skipped: ReadonlyArray<string>
}

const mapFsError = (error: PlatformError): AppError => fileError(String(error))

const compareStrings = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

const ensureFixturesExist = (
  fs: FileSystemService,
  directory: string
): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const exists = yield* _(fs.exists(directory).pipe(Effect.mapError(mapFsError)))
    if (!exists) {
      return yield* _(Effect.fail(fixturesNotFound(directory)))
    }
  })

/**
 * Split directory entries into runnable fixtures and skipped files.
 * The outcome table kept beside the fixtures is neither.
 *
 * @pure true
 * @invariant both lists are sorted by file name
 */
export const classifyEntries = (entries: ReadonlyArray<string>): ClassifiedEntries => {
  const sorted = [...entries].sort(compareStrings)
  const fixtures: Array<{ readonly file: string; readonly kind: FixtureKind }> = []
  const skipped: Array<string> = []
  for (const file of sorted) {
    if (file === EXPECTATIONS_FILE_NAME) {
      continue
    }
    const kind = classifyFixture(file)
    if (Option.isSome(kind)) {
      fixtures.push({ file, kind: kind.value })
    } else {
      skipped.push(file)
    }
  }
  return { fixtures, skipped }
}

const logResult = (result: FixtureResult): Effect.Effect<void> =>
  result.verdict === "fail"
    ? Effect.logWarning(
      `${result.file}: expected ${result.expected ?? "either"}, observed ${observedOutcome(result.observed)}`
    )
    : Effect.logDebug(`${result.file}: ${result.verdict} (${observedOutcome(result.observed)})`)

/**
 * Evaluate every fixture of a directory under one Unicode profile.
 *
 * @param settings - Fixture directory, parse options and outcome table.
 * @returns ConformanceReport in file name order.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant files without a y_/n_/i_ prefix or a .json suffix are skipped, never evaluated
 * @complexity O(n)
 */
export const runConformance = (
  settings: ConformanceSettings
): Effect.Effect<ConformanceReport, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)

    yield* _(ensureFixturesExist(fs, settings.fixtures))
    const entries = yield* _(fs.readDirectory(settings.fixtures).pipe(Effect.mapError(mapFsError)))
    const classified = classifyEntries(entries)
    for (const file of classified.skipped) {
      yield* _(Effect.logWarning(`skipping ${file}: not a y_/n_/i_ .json fixture`))
    }

    const results = yield* _(
      Effect.forEach(classified.fixtures, (fixture) =>
        Effect.gen(function*(_) {
          const bytes = yield* _(
            fs.readFile(path.join(settings.fixtures, fixture.file)).pipe(Effect.mapError(mapFsError))
          )
          const result = evaluateFixture({ ...fixture, bytes }, settings.options, settings.table)
          yield* _(logResult(result))
          return result
        }), { concurrency: 1 })
    )
    return buildConformanceReport(settings.options.profile, results, classified.skipped)
  })
