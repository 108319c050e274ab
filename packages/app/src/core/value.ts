// CHANGE: model parsed documents as an explicit tagged tree
// WHY: integer and float leaves stay distinguishable after parsing
// QUOTE(TZ): "a repeated key overwrites the previous value in place"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ ObjectValue: keys(o.entries) are unique
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entry order is first-insertion order; integers are exact
// COMPLEXITY: O(1)/O(1)

export type IntegerValue = { readonly _tag: "Integer"; readonly value: bigint }
export type FloatValue = { readonly _tag: "Float"; readonly value: number }
export type StringValue = { readonly _tag: "String"; readonly value: string }
export type ArrayValue = { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
export type ObjectValue = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export type NumberValue = IntegerValue | FloatValue

export type Value = ObjectValue | ArrayValue | StringValue | IntegerValue | FloatValue

export type DocumentValue = ObjectValue | ArrayValue

export const integerValue = (value: bigint): IntegerValue => ({ _tag: "Integer", value })

export const floatValue = (value: number): FloatValue => ({ _tag: "Float", value })

export const stringValue = (value: string): StringValue => ({ _tag: "String", value })

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

export const objectValue = (entries: ReadonlyMap<string, Value>): ObjectValue => ({
  _tag: "Object",
  entries
})

/**
 * Source-like text of a number leaf. Whole floats keep a `.0` so they stay
 * distinguishable from integers once printed.
 *
 * @pure true
 */
export const formatNumber = (value: NumberValue): string => {
  if (value._tag === "Integer") {
    return value.value.toString()
  }
  const text = String(value.value)
  return /^\d+$/.test(text) ? `${text}.0` : text
}
