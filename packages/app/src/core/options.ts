import * as Either from "effect/Either"

// CHANGE: describe the decoder knobs and the two Unicode profiles
// WHY: one engine serves both strict scalar semantics and UTF-16 code unit semantics
// FORMAT THEOREM: ∀p: resolve(p).k = p.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 1 ≤ maxDepth ≤ MAX_DEPTH_CEILING and maxExponent ≥ 0 after validation
// COMPLEXITY: O(1)/O(1)

/**
 * `scalar`: the input is a sequence of Unicode scalar values; a leading BOM is an error.
 * `utf16`: the input is a sequence of UTF-16 code units; a leading BOM before `{` is ignored.
 */
export type UnicodeProfile = "scalar" | "utf16"

export const unicodeProfiles: ReadonlyArray<UnicodeProfile> = ["scalar", "utf16"]

export interface ParseOptions {
  readonly profile: UnicodeProfile
  readonly maxDepth: number
  readonly maxExponent: number
}

// containers recurse on the call stack; deeper limits would overflow it before NestingTooDeep
export const MAX_DEPTH_CEILING = 2048

/**
 * The `maxExponent` default is a deliberate limit on exactly scaled integers: a literal such
 * as `1e10001` fails with InvalidNumber under it. Raise it to accept larger exact values.
 */
export const defaultParseOptions: ParseOptions = {
  profile: "scalar",
  maxDepth: 512,
  maxExponent: 10_000
}

export const isUnicodeProfile = (value: string): value is UnicodeProfile =>
  value === "scalar" || value === "utf16"

export const resolveParseOptions = (options: Partial<ParseOptions> | undefined): ParseOptions => ({
  profile: options?.profile ?? defaultParseOptions.profile,
  maxDepth: Math.min(options?.maxDepth ?? defaultParseOptions.maxDepth, MAX_DEPTH_CEILING),
  maxExponent: options?.maxExponent ?? defaultParseOptions.maxExponent
})

/**
 * Parse a non-negative integer limit given as text.
 *
 * @param name - Option name used in the error message.
 * @param raw - Text to parse.
 * @param minimum - Smallest accepted value.
 * @param maximum - Largest accepted value.
 * @returns Either with the limit or a message.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseLimit = (
  name: string,
  raw: string,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER
): Either.Either<number, string> => {
  if (!/^\d+$/.test(raw)) {
    return Either.left(`${name} must be an integer, got: ${raw}`)
  }
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value < minimum) {
    return Either.left(`${name} must be an integer ≥ ${minimum}, got: ${raw}`)
  }
  if (value > maximum) {
    return Either.left(`${name} must be an integer ≤ ${maximum}, got: ${raw}`)
  }
  return Either.right(value)
}
