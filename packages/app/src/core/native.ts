import type { Value } from "./value.js"

// CHANGE: convert decoded Values into plain JavaScript data
// WHY: boundary decoders (@effect/schema) validate unknown JS values, not Value trees
// FORMAT THEOREM: ∀v: isSafe(v.exact) → toNative(v) = Number(v.exact)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object keys never reach Object.prototype (records have a null prototype)
// COMPLEXITY: O(n)

export type Native =
  | null
  | boolean
  | number
  | bigint
  | string
  | ReadonlyArray<Native>
  | { readonly [key: string]: Native }

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

const exactToNative = (exact: bigint): number | bigint =>
  exact >= MIN_SAFE && exact <= MAX_SAFE ? Number(exact) : exact

/**
 * Convert a Value tree into plain JavaScript data.
 *
 * @param value - Decoded value.
 * @returns Plain data; exact integers outside the safe range stay bigint.
 *
 * @pure true
 * @complexity O(n)
 */
export const toNative = (value: Value): Native => {
  switch (value._tag) {
    case "String":
    case "Bool":
      return value.value
    case "Null":
      return null
    case "Number":
      return value.exact === undefined ? value.approximate ?? Number.NaN : exactToNative(value.exact)
    case "Array":
      return value.items.map(toNative)
    case "Object": {
      const record: Record<string, Native> = Object.create(null)
      for (const [key, item] of value.entries) {
        record[key] = toNative(item)
      }
      return record
    }
  }
}
