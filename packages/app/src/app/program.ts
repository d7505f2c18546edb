import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { hasFailures } from "../core/conformance.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderHumanReport, renderJsonReport, renderValue, renderValueJson } from "../core/report.js"
import type { ConformanceReport } from "../core/types.js"
import type { Value } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument } from "../shell/document.js"
import { loadOutcomeTable } from "../shell/expectations-file.js"
import { runConformance } from "../shell/fixtures.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: output emitted at most once per run
// COMPLEXITY: O(n)

export type ProgramResult =
  | { readonly command: "check"; readonly report: ConformanceReport; readonly exitCode: number }
  | { readonly command: "parse"; readonly value: Value; readonly exitCode: number }

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (silent: boolean, render: () => string): Effect.Effect<void> =>
  silent ? Effect.void : writeStdout(render())

const logLevelFor = (cli: CliArgs): LogLevel.LogLevel => {
  if (cli.silent) {
    return LogLevel.None
  }
  return cli.verbose ? LogLevel.Debug : LogLevel.Info
}

const handleCheck = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const resolved = resolveConfig(cli, fileConfig)
    const table = yield* _(loadOutcomeTable(resolved.expectations, resolved.expectationsExplicit))
    yield* _(
      Effect.logDebug(
        `checking ${resolved.fixtures} with profile ${resolved.parse.profile} (${table.size} pinned outcomes)`
      )
    )
    const report = yield* _(runConformance({ fixtures: resolved.fixtures, options: resolved.parse, table }))
    yield* _(emit(cli.silent, () => cli.json ? renderJsonReport(report) : renderHumanReport(report)))
    return { command: "check", report, exitCode: hasFailures(report) ? 2 : 0 } as const
  })

const handleParse = (cli: CliArgs, file: string): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const resolved = resolveConfig(cli, fileConfig)
    const document = yield* _(readDocument(file, resolved.parse))
    yield* _(
      emit(
        cli.silent,
        () =>
          cli.json
            ? renderValueJson(file, document.decoded, document.value)
            : renderValue(file, document.decoded, document.value)
      )
    )
    return { command: "parse", value: document.value, exitCode: 0 } as const
  })

const executeCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli)),
    Match.when("parse", () => handleParse(cli, cli.file ?? "")),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the command outcome and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli).pipe(Logger.withMinimumLogLevel(logLevelFor(cli))))
  })
