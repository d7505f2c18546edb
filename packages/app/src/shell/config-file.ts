import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as Effect from "effect/Effect"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { MAX_DEPTH_CEILING } from "../core/options.js"
import { loadJsonFile } from "./json-file.js"

// CHANGE: decode .json-strict.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined
// COMPLEXITY: O(n)

export const RawConfigSchema = S.partial(
  S.Struct({
    profile: S.Literal("scalar", "utf16"),
    maxDepth: S.Int.pipe(S.greaterThanOrEqualTo(1), S.lessThanOrEqualTo(MAX_DEPTH_CEILING)),
    maxExponent: S.Int.pipe(S.greaterThanOrEqualTo(0)),
    expectations: S.String,
    fixtures: S.String
  })
)

type RawConfig = S.Schema.Type<typeof RawConfigSchema>

const toFileConfig = (config: RawConfig): FileConfig => ({
  ...(config.profile === undefined ? {} : { profile: config.profile }),
  ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
  ...(config.maxExponent === undefined ? {} : { maxExponent: config.maxExponent }),
  ...(config.expectations === undefined ? {} : { expectations: config.expectations }),
  ...(config.fixtures === undefined ? {} : { fixtures: config.fixtures })
})

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  loadJsonFile(RawConfigSchema, path, explicit).pipe(
    Effect.map((config) => config === undefined ? undefined : toFileConfig(config))
  )
