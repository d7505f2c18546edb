import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DecodedText } from "../core/charset.js"
import { decodeDocument } from "../core/charset.js"
import type { AppError } from "../core/errors.js"
import { decodeFileError, documentError, fileError } from "../core/errors.js"
import type { ParseOptions } from "../core/options.js"
import { parse } from "../core/parse.js"
import type { Value } from "../core/value.js"

// CHANGE: read a single JSON document from disk and decode it
// WHY: the parse command needs the same charset sniffing as the conformance run
// FORMAT THEOREM: ∀f: read(f) = Right(d) → parse(decode(bytes(f))) = Right(d.value)
// PURITY: SHELL
// EFFECT: Effect<ParsedDocument, AppError, FileSystem>
// INVARIANT: charset failures and parse failures keep their own error tags
// COMPLEXITY: O(n)

export interface ParsedDocument {
  readonly file: string
  readonly decoded: DecodedText
  readonly value: Value
}

export const readDocument = (
  file: string,
  options: ParseOptions
): Effect.Effect<ParsedDocument, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(fs.readFile(file).pipe(Effect.mapError((error) => fileError(String(error)))))
    const decoded = decodeDocument(bytes)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(decodeFileError(file, decoded.left)))
    }
    const parsed = parse(decoded.right.text, options)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(documentError(file, parsed.left)))
    }
    yield* _(Effect.logDebug(`${file}: decoded as ${decoded.right.encoding}${decoded.right.bom ? " with BOM" : ""}`))
    return { file, decoded: decoded.right, value: parsed.right }
  })
