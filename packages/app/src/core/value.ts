// CHANGE: model decoded JSON documents as a closed tagged union
// WHY: keep exact integers, approximate floats and literal text side by side without loss
// FORMAT THEOREM: ∀n ∈ NumberValue: (n.exact ≠ undefined) ⊕ (n.approximate ≠ undefined)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Value trees are acyclic and owned by a single parse result
// COMPLEXITY: O(1)/O(1)

export type StringValue = { readonly _tag: "String"; readonly value: string }

export type NumberValue = {
  readonly _tag: "Number"
  readonly exact: bigint | undefined
  readonly approximate: number | undefined
  readonly literal: string
}

export type BoolValue = { readonly _tag: "Bool"; readonly value: boolean }
export type NullValue = { readonly _tag: "Null" }
export type ArrayValue = { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
export type ObjectValue = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export type Value =
  | StringValue
  | NumberValue
  | BoolValue
  | NullValue
  | ArrayValue
  | ObjectValue

export const stringValue = (value: string): StringValue => ({ _tag: "String", value })

export const exactNumber = (exact: bigint, literal: string): NumberValue => ({
  _tag: "Number",
  exact,
  approximate: undefined,
  literal
})

export const approximateNumber = (approximate: number, literal: string): NumberValue => ({
  _tag: "Number",
  exact: undefined,
  approximate,
  literal
})

export const boolValue = (value: boolean): BoolValue => ({ _tag: "Bool", value })

export const nullValue: NullValue = { _tag: "Null" }

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

export const objectValue = (entries: ReadonlyMap<string, Value>): ObjectValue => ({
  _tag: "Object",
  entries
})

/**
 * Structural equality over Value trees.
 *
 * Objects compare as key/value mappings; entry order is ignored.
 * Approximate numbers compare with Object.is, so -0 and 0 differ.
 *
 * @pure true
 * @complexity O(n)
 */
export const valueEquals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "String":
    case "Bool":
      return right._tag === left._tag && right.value === left.value
    case "Null":
      return right._tag === "Null"
    case "Number":
      return right._tag === "Number" &&
        right.exact === left.exact &&
        Object.is(right.approximate, left.approximate) &&
        right.literal === left.literal
    case "Array":
      return right._tag === "Array" &&
        right.items.length === left.items.length &&
        left.items.every((item, index) => {
          const other = right.items[index]
          return other !== undefined && valueEquals(item, other)
        })
    case "Object": {
      if (right._tag !== "Object" || right.entries.size !== left.entries.size) {
        return false
      }
      for (const [key, item] of left.entries) {
        const other = right.entries.get(key)
        if (other === undefined || !valueEquals(item, other)) {
          return false
        }
      }
      return true
    }
  }
}
