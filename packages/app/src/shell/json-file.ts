import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import { decodeDocument } from "../core/charset.js"
import type { AppError } from "../core/errors.js"
import { configError, decodeFileError, fileError } from "../core/errors.js"
import { toNative } from "../core/native.js"
import { parse } from "../core/parse.js"
import { describeParseError } from "../core/parse-error.js"

// CHANGE: decode project JSON files with the strict decoder and validate them with a schema
// WHY: configuration and outcome tables go through the same engine they configure
// FORMAT THEOREM: ∀f: decode(f) = Right(a) → parse(f) succeeded ∧ a ⊨ schema
// PURITY: SHELL
// EFFECT: Effect<A, AppError, FileSystem>
// INVARIANT: a missing file is reported as undefined only when it was not named explicitly
// COMPLEXITY: O(n)

export const decodeJsonText = <A, I>(
  schema: S.Schema<A, I>,
  file: string,
  raw: string
): Effect.Effect<A, AppError> => {
  const parsed = parse(raw)
  if (Either.isLeft(parsed)) {
    return Effect.fail(configError(file, describeParseError(parsed.left)))
  }
  return pipe(
    S.decodeUnknown(schema)(toNative(parsed.right)),
    Effect.mapError((error) => configError(file, TreeFormatter.formatErrorSync(error)))
  )
}

/**
 * Read and decode an optional JSON file.
 *
 * @param schema - Schema the decoded document must satisfy.
 * @param path - File path.
 * @param explicit - Whether the user named the file (a missing explicit file is an error).
 * @returns The decoded value, or undefined for a missing implicit file.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n)
 */
export const loadJsonFile = <A, I>(
  schema: S.Schema<A, I>,
  path: string,
  explicit: boolean
): Effect.Effect<A | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`File not found: ${path}`)))
      }
      return undefined
    }
    const bytes = yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = decodeDocument(bytes)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(decodeFileError(path, decoded.left)))
    }
    // configuration files may carry a BOM whatever the parse profile
    const contents = decoded.right.bom ? decoded.right.text.slice(1) : decoded.right.text
    return yield* _(decodeJsonText(schema, path, contents))
  })
